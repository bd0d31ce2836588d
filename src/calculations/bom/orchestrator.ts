/**
 * Bestellijst Orchestrator
 * rows → classify → root → explode → aggregate → trace report
 */

import { v4 as uuidv4 } from 'uuid';
import {
  BestellijstResponse,
  BomRow,
  BomWarning,
  CompareResponse,
  ExplosionLimits,
  RootPolicy,
  TargetLine
} from '../../types';
import { CALCULATION_VERSION, QUANTITY_TOLERANCE } from '../../constants';
import { loadBomConfig, mergeExplosionLimits } from '../../config';
import { classifyBomRows, countByClassification } from './classify';
import { resolveRootItem } from './root';
import { explodeBom } from './explode';
import { aggregateBestellijst, aggregateLengthItems } from './aggregate';
import { buildTraceReport } from './trace';
import { compareWithTarget, summarizeComparison } from './reconcile';

export interface BestellijstOptions {
  rootPolicy?: RootPolicy;
  limits?: Partial<Record<keyof ExplosionLimits, unknown>>;
}

/**
 * Throws BomError on a missing (or, under the strict policy, ambiguous) root
 * or when the traversal path limit is exceeded.
 */
export function generateBestellijst(
  rows: readonly BomRow[],
  options: BestellijstOptions = {}
): BestellijstResponse {
  const config = loadBomConfig();
  const limits = mergeExplosionLimits(config.limits, options.limits);
  const warnings: BomWarning[] = [];

  const classified = classifyBomRows(rows);
  const root = resolveRootItem(classified, options.rootPolicy ?? config.rootPolicy);
  warnings.push(...root.warnings);

  const explosion = explodeBom(root.root_item, classified, limits);
  warnings.push(...explosion.warnings);

  const counts = countByClassification(classified);
  if (counts.unknown > 0) {
    warnings.push({
      code: 'UNKNOWN_CLASSIFICATION',
      message: `${counts.unknown} row(s) match neither "purch" nor "production" and are excluded from all totals`
    });
  }

  if (explosion.leafTotals.size === 0 && explosion.lengthTotals.size === 0) {
    warnings.push({
      code: 'EMPTY_BESTELLIJST',
      message: `Root ${root.root_item} has no buy or make items below it`,
      item: root.root_item
    });
  }

  return {
    success: true,
    root_item: root.root_item,
    items: aggregateBestellijst(explosion.leafTotals, classified),
    length_items: aggregateLengthItems(explosion.lengthTotals, classified),
    trace: buildTraceReport(explosion.trace),
    summary: {
      rows_total: classified.length,
      rows_by_classification: counts,
      leaf_items: explosion.leafTotals.size,
      length_items: explosion.lengthTotals.size,
      visited_paths: explosion.visitedPaths
    },
    provenance: {
      calculation_id: uuidv4(),
      version: CALCULATION_VERSION,
      timestamp: new Date().toISOString(),
      warnings
    }
  };
}

/**
 * Bestellijst plus reconciliation against a target list (e.g. D365)
 */
export function generateComparison(
  rows: readonly BomRow[],
  targetLines: readonly TargetLine[],
  options: BestellijstOptions & { tolerance?: number } = {}
): CompareResponse {
  const bestellijst = generateBestellijst(rows, options);
  const tolerance = options.tolerance ?? QUANTITY_TOLERANCE;
  const comparisonRows = compareWithTarget(bestellijst.items, targetLines, tolerance);

  return {
    ...bestellijst,
    comparison: {
      tolerance,
      rows: comparisonRows,
      summary: summarizeComparison(comparisonRows)
    }
  };
}
