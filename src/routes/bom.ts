/**
 * BOM Explosion Routes
 */

import { Router, Request, Response } from 'express';
import { generateBestellijst, generateComparison } from '../calculations/bom';
import { readBomRows, readOptions, readTargetLines } from '../transformers/request';
import { buildComparisonWorkbook } from '../transformers/export';
import { fetchStoredBomRows } from '../services/bomStore';
import { isDatabaseConfigured, testConnection } from '../services/database';
import { EXPORT_FILE_NAME } from '../constants';
import { ErrorResponse } from '../types';
import { BomError, isBomError } from '../utils/errors';

const router = Router();

function sendError(res: Response, error: unknown, context: string): void {
  if (isBomError(error)) {
    console.warn(`⚠️ ${context}: ${error.code} - ${error.message}`);
    const body: ErrorResponse = {
      success: false,
      error: error.message,
      error_code: error.code,
      details: error.details ?? undefined,
      timestamp: new Date().toISOString()
    };
    res.status(error.statusCode).json(body);
    return;
  }

  console.error(`${context} error:`, error);
  const body: ErrorResponse = {
    success: false,
    error: error instanceof Error ? error.message : 'Unknown error occurred',
    timestamp: new Date().toISOString()
  };
  res.status(500).json(body);
}

/**
 * POST /api/v1/bom/explode
 * Bestellijst from a Teamcenter export (csv) or structured rows
 */
router.post('/explode', (req: Request, res: Response) => {
  const startTime = Date.now();

  try {
    const rows = readBomRows(req.body);
    const options = readOptions(req.body);
    const result = generateBestellijst(rows, options);

    console.log(`✅ Explode complete: root=${result.root_item}, rows=${rows.length}, items=${result.items.length}, length_items=${result.length_items.length}, duration=${Date.now() - startTime}ms`);
    res.json(result);
  } catch (error) {
    sendError(res, error, 'Explode');
  }
});

/**
 * POST /api/v1/bom/compare
 * Bestellijst reconciled against target_lines and/or a D365 workbook
 */
router.post('/compare', (req: Request, res: Response) => {
  const startTime = Date.now();

  try {
    const rows = readBomRows(req.body);
    const targetLines = readTargetLines(req.body);
    if (!targetLines) {
      throw new BomError('INVALID_INPUT', 'Missing target list (expected "target_lines" or "d365_xlsx_base64")');
    }

    const options = readOptions(req.body);
    const result = generateComparison(rows, targetLines, options);

    const { summary } = result.comparison;
    console.log(`✅ Compare complete: root=${result.root_item}, match=${summary.match}, differs=${summary.quantity_differs + summary.name_differs}, only_bom=${summary.only_in_bom}, only_target=${summary.only_in_target}, duration=${Date.now() - startTime}ms`);
    res.json(result);
  } catch (error) {
    sendError(res, error, 'Compare');
  }
});

/**
 * POST /api/v1/bom/compare/export
 * Same input as /compare, returns the comparison as an Excel download
 */
router.post('/compare/export', (req: Request, res: Response) => {
  try {
    const rows = readBomRows(req.body);
    const targetLines = readTargetLines(req.body);
    if (!targetLines) {
      throw new BomError('INVALID_INPUT', 'Missing target list (expected "target_lines" or "d365_xlsx_base64")');
    }

    const result = generateComparison(rows, targetLines, readOptions(req.body));
    const workbook = buildComparisonWorkbook({
      comparison: result.comparison.rows,
      bestellijst: result.items,
      lengthItems: result.length_items
    });

    res.setHeader('Content-Type', 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
    res.setHeader('Content-Disposition', `attachment; filename="${EXPORT_FILE_NAME}"`);
    res.send(workbook);
  } catch (error) {
    sendError(res, error, 'Compare export');
  }
});

/**
 * POST /api/v1/bom/stored/:bomId/explode
 * Bestellijst from a BOM kept in the database
 */
router.post('/stored/:bomId/explode', async (req: Request, res: Response) => {
  try {
    const rows = await fetchStoredBomRows(req.params.bomId);
    const result = generateBestellijst(rows, readOptions(req.body));
    res.json(result);
  } catch (error) {
    sendError(res, error, 'Stored explode');
  }
});

/**
 * GET /api/v1/bom/db-status
 */
router.get('/db-status', async (req: Request, res: Response) => {
  const configured = isDatabaseConfigured();
  const connected = configured ? await testConnection() : false;

  res.json({
    database: {
      configured,
      connected,
      message: !configured
        ? 'Database not configured - stored BOMs unavailable'
        : connected
          ? 'Connected to Supabase'
          : 'Database configured but connection failed'
    }
  });
});

export default router;
