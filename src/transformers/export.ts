/**
 * Comparison export - .xlsx workbook
 * Sheets: "Vergelijking" (always), "Bestellijst" and "Lengte-artikelen" (when given)
 */

import * as XLSX from 'xlsx';
import { BestellijstLine, ComparisonRow, LengthItemLine } from '../types';

export const COMPARISON_SHEET = 'Vergelijking';
export const BESTELLIJST_SHEET = 'Bestellijst';
export const LENGTH_SHEET = 'Lengte-artikelen';

export interface ComparisonWorkbookInput {
  comparison: readonly ComparisonRow[];
  bestellijst?: readonly BestellijstLine[];
  lengthItems?: readonly LengthItemLine[];
}

function comparisonSheet(rows: readonly ComparisonRow[]): XLSX.WorkSheet {
  return XLSX.utils.json_to_sheet(rows.map(row => ({
    'Item': row.item,
    'Product name (BOM)': row.product_name_bom ?? '',
    'Quantity (BOM)': row.total_quantity_bom ?? '',
    'Product name (target)': row.product_name_target ?? '',
    'Quantity (target)': row.total_quantity_target ?? '',
    'Status': row.label
  })));
}

function bestellijstSheet(lines: readonly BestellijstLine[]): XLSX.WorkSheet {
  return XLSX.utils.json_to_sheet(lines.map(line => ({
    'Item': line.item,
    'Product name': line.product_name,
    'Total quantity': line.total_quantity
  })));
}

function lengthSheet(lines: readonly LengthItemLine[]): XLSX.WorkSheet {
  return XLSX.utils.json_to_sheet(lines.map(line => ({
    'Item': line.item,
    'Product name': line.product_name,
    'Total quantity': line.total_quantity,
    'Template': line.template
  })));
}

export function buildComparisonWorkbook(input: ComparisonWorkbookInput): Buffer {
  const workbook = XLSX.utils.book_new();

  XLSX.utils.book_append_sheet(workbook, comparisonSheet(input.comparison), COMPARISON_SHEET);

  if (input.bestellijst) {
    XLSX.utils.book_append_sheet(workbook, bestellijstSheet(input.bestellijst), BESTELLIJST_SHEET);
  }
  if (input.lengthItems && input.lengthItems.length > 0) {
    XLSX.utils.book_append_sheet(workbook, lengthSheet(input.lengthItems), LENGTH_SHEET);
  }

  const excelBuffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  return excelBuffer;
}
