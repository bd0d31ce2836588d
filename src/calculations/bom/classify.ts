/**
 * Row Classification
 * make_or_buy / line_type → buy | make | phantom | unknown
 * template containing "mm" → length item
 */

import { BomRow, Classification, ClassifiedBomRow } from '../../types';
import { CLASSIFICATION_KEYWORDS } from '../../constants';

function normalize(value: string | null | undefined): string {
  return (value ?? '').trim().toLowerCase();
}

/**
 * Precedence: "purch" → buy, then "production" → phantom/make, else unknown
 */
export function classifyRow(
  makeOrBuy: string | null | undefined,
  lineType: string | null | undefined
): Classification {
  const mb = normalize(makeOrBuy);
  const lt = normalize(lineType);

  if (mb.includes(CLASSIFICATION_KEYWORDS.purchased)) {
    return 'buy';
  }

  if (mb.includes(CLASSIFICATION_KEYWORDS.production)) {
    const isPhantom =
      mb.includes(CLASSIFICATION_KEYWORDS.phantom) ||
      lt.includes(CLASSIFICATION_KEYWORDS.phantom);
    return isPhantom ? 'phantom' : 'make';
  }

  return 'unknown';
}

export function isLengthItem(template: string | null | undefined): boolean {
  return normalize(template).includes(CLASSIFICATION_KEYWORDS.length_template);
}

export function classifyBomRows(rows: readonly BomRow[]): readonly ClassifiedBomRow[] {
  return rows.map(row => Object.freeze({
    ...row,
    classification: classifyRow(row.make_or_buy, row.line_type),
    is_length_item: isLengthItem(row.template)
  }));
}

export function countByClassification(
  rows: readonly ClassifiedBomRow[]
): Record<Classification, number> {
  const counts: Record<Classification, number> = { buy: 0, make: 0, phantom: 0, unknown: 0 };
  for (const row of rows) {
    counts[row.classification]++;
  }
  return counts;
}
