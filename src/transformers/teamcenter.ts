/**
 * Transform Teamcenter BOM exports into normalized BomRow records
 * CSV: "(#)"-separated, ISO-8859-1, headers like "Qty Per" / "Make/Buy"
 */

import { parse } from 'csv-parse/sync';
import { BomRow, RawBomRow } from '../types';
import {
  NUMBER_PATTERN,
  REQUIRED_TEAMCENTER_COLUMNS,
  ROOT_ROW_QUANTITY,
  TEAMCENTER_COLUMNS,
  TEAMCENTER_CSV
} from '../constants';
import { BomError, MalformedQuantityDetail } from '../utils/errors';

type TeamcenterColumn = keyof typeof TEAMCENTER_COLUMNS;

/**
 * "Qty Per " → "qtyper", "Make/Buy" → "makebuy"
 */
export function normalizeHeader(header: string): string {
  return header.trim().toLowerCase().replace(/[^\w]/g, '');
}

/**
 * Comma decimals are converted; returns null when the value is not a finite number
 */
export function parseQuantity(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') return null;

  const text = value.replace(/,/g, '.').trim();
  if (!NUMBER_PATTERN.test(text)) return null;

  const n = Number(text);
  return Number.isFinite(n) ? n : null;
}

export function parseLevel(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : null;
  }
  if (typeof value !== 'string' || value.trim() === '') return null;

  const n = Number(value.trim());
  return Number.isInteger(n) ? n : null;
}

function text(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number') return String(value);
  return '';
}

function malformedQuantityError(malformed: MalformedQuantityDetail[]): BomError {
  const preview = malformed.slice(0, 5).map(m => `row ${m.row} ("${m.value}")`).join(', ');
  return new BomError(
    'MALFORMED_QUANTITY',
    `${malformed.length} row(s) have a quantity that is not a number: ${preview}${malformed.length > 5 ? ', …' : ''}`,
    malformed
  );
}

/**
 * Normalize loosely-typed rows (JSON callers, BOM store).
 * The root row (level 0) is never an edge, so its quantity may be left empty.
 * All malformed quantities are reported together in one MALFORMED_QUANTITY error.
 */
export function normalizeBomRows(raw: readonly RawBomRow[]): BomRow[] {
  const rows: BomRow[] = [];
  const malformed: MalformedQuantityDetail[] = [];

  raw.forEach((r, i) => {
    const level = parseLevel(r.level);
    const quantityText = text(r.quantity_per_parent);
    const quantity = level === 0 && quantityText === ''
      ? ROOT_ROW_QUANTITY
      : parseQuantity(r.quantity_per_parent);

    if (quantity === null) {
      malformed.push({ row: i + 1, value: quantityText });
      return;
    }

    rows.push({
      parent_item: text(r.parent_item),
      item: text(r.item),
      quantity_per_parent: quantity,
      template: text(r.template),
      make_or_buy: text(r.make_or_buy),
      line_type: text(r.line_type),
      product_name: text(r.product_name),
      level
    });
  });

  if (malformed.length > 0) {
    throw malformedQuantityError(malformed);
  }

  return rows;
}

function isTeamcenterColumn(header: string): header is TeamcenterColumn {
  return Object.prototype.hasOwnProperty.call(TEAMCENTER_COLUMNS, header);
}

function toRawBomRow(record: unknown): RawBomRow {
  const raw: RawBomRow = {};
  if (typeof record !== 'object' || record === null) return raw;

  for (const [header, value] of Object.entries(record)) {
    if (isTeamcenterColumn(header) && typeof value === 'string') {
      raw[TEAMCENTER_COLUMNS[header]] = value;
    }
  }
  return raw;
}

/**
 * Parse a Teamcenter export. A Buffer is decoded as ISO-8859-1.
 */
export function parseTeamcenterCsv(input: string | Buffer): BomRow[] {
  const content = typeof input === 'string' ? input : input.toString(TEAMCENTER_CSV.encoding);

  let headers: string[] = [];
  let records: unknown;
  try {
    records = parse(content, {
      delimiter: TEAMCENTER_CSV.delimiter,
      columns: (header: string[]) => {
        headers = header.map(normalizeHeader);
        return headers;
      },
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      relax_quotes: true
    });
  } catch (parseError) {
    const message = parseError instanceof Error ? parseError.message : 'Unknown parse error';
    throw new BomError('INVALID_INPUT', `CSV parsing error: ${message}`);
  }

  if (!Array.isArray(records) || records.length === 0) {
    return [];
  }

  const missing = REQUIRED_TEAMCENTER_COLUMNS.filter(column => !headers.includes(column));
  if (missing.length > 0) {
    throw new BomError(
      'MISSING_COLUMN',
      `Missing required column(s): ${missing.join(', ')}`,
      { missing, found: headers }
    );
  }

  return normalizeBomRows(records.map(toRawBomRow));
}
