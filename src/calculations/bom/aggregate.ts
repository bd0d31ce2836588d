/**
 * Bestellijst Aggregation
 * Leaf totals + product names → one line per distinct (item, product_name)
 */

import { BestellijstLine, BomRow, LengthItemLine } from '../../types';

/**
 * Distinct product names per item over the item column, first-seen order
 */
export function collectProductNames(rows: readonly BomRow[]): Map<string, string[]> {
  const names = new Map<string, string[]>();
  for (const row of rows) {
    const known = names.get(row.item);
    if (!known) {
      names.set(row.item, [row.product_name]);
    } else if (!known.includes(row.product_name)) {
      known.push(row.product_name);
    }
  }
  return names;
}

/**
 * First-seen template per item
 */
export function collectTemplates(rows: readonly BomRow[]): Map<string, string> {
  const templates = new Map<string, string>();
  for (const row of rows) {
    if (!templates.has(row.item)) {
      templates.set(row.item, row.template);
    }
  }
  return templates;
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function sortByItem<T extends BestellijstLine>(lines: T[]): T[] {
  return lines.sort((a, b) =>
    compareStrings(a.item, b.item) || compareStrings(a.product_name, b.product_name)
  );
}

/**
 * Items with several recorded names get one line per name, each carrying the
 * item's full total. Names are passed through, not reconciled.
 */
export function aggregateBestellijst(
  totals: ReadonlyMap<string, number>,
  rows: readonly BomRow[]
): BestellijstLine[] {
  const names = collectProductNames(rows);
  const lines: BestellijstLine[] = [];

  for (const [item, total_quantity] of totals) {
    for (const product_name of names.get(item) ?? ['']) {
      lines.push({ item, product_name, total_quantity });
    }
  }

  return sortByItem(lines);
}

export function aggregateLengthItems(
  lengthTotals: ReadonlyMap<string, number>,
  rows: readonly BomRow[]
): LengthItemLine[] {
  const templates = collectTemplates(rows);

  return sortByItem(
    aggregateBestellijst(lengthTotals, rows).map(line => ({
      ...line,
      template: templates.get(line.item) ?? ''
    }))
  );
}
