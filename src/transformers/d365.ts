/**
 * Transform D365 exports (Excel) into TargetLine records
 * Headers: "Item number", "Product name", "Quantity"
 */

import * as XLSX from 'xlsx';
import { RawTargetLine, TargetLine } from '../types';
import { D365_COLUMNS, NUMBER_PATTERN } from '../constants';
import { BomError } from '../utils/errors';

type D365Column = keyof typeof D365_COLUMNS;

function isD365Column(header: string): header is D365Column {
  return Object.prototype.hasOwnProperty.call(D365_COLUMNS, header);
}

function text(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number') return String(value);
  return '';
}

/**
 * Non-numeric quantities count as 0
 */
export function coerceQuantity(value: unknown): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value === 'string' && NUMBER_PATTERN.test(value.trim())) {
    return Number(value.trim());
  }
  return 0;
}

/**
 * Group by (item, product_name), summing quantities; lines without an item are skipped
 */
export function normalizeTargetLines(raw: readonly RawTargetLine[]): TargetLine[] {
  const grouped = new Map<string, TargetLine>();

  for (const r of raw) {
    const item = text(r.item);
    if (!item) continue;

    const product_name = text(r.product_name);
    const key = JSON.stringify([item, product_name]);
    const existing = grouped.get(key);
    const quantity = coerceQuantity(r.total_quantity);

    if (existing) {
      existing.total_quantity += quantity;
    } else {
      grouped.set(key, { item, product_name, total_quantity: quantity });
    }
  }

  return [...grouped.values()];
}

function toRawTargetLine(record: Record<string, unknown>): RawTargetLine {
  const raw: RawTargetLine = {};
  for (const [header, value] of Object.entries(record)) {
    const column = header.trim().toLowerCase();
    if (!isD365Column(column)) continue;

    const field = D365_COLUMNS[column];
    if (field === 'total_quantity' || field === 'item') {
      raw[field] = typeof value === 'number' ? value : text(value);
    } else {
      raw[field] = text(value);
    }
  }
  return raw;
}

/**
 * Read the first sheet of a D365 export workbook
 */
export function parseD365Workbook(buffer: Buffer): TargetLine[] {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(buffer, { type: 'buffer' });
  } catch (readError) {
    const message = readError instanceof Error ? readError.message : 'Unknown read error';
    throw new BomError('INVALID_INPUT', `Excel parsing error: ${message}`);
  }

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    throw new BomError('INVALID_INPUT', 'D365 workbook contains no sheets');
  }

  const records = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: '' });
  return normalizeTargetLines(records.map(toRawTargetLine));
}
