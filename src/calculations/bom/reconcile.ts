/**
 * Bestellijst vs target list reconciliation
 * Outer join on item; an item on both sides yields one row per pair of lines
 */

import {
  BestellijstLine,
  ComparisonRow,
  ComparisonStatus,
  ComparisonSummary,
  TargetLine
} from '../../types';
import { COMPARISON_LABELS, QUANTITY_TOLERANCE } from '../../constants';

function groupByItem<T extends { item: string }>(lines: readonly T[]): Map<string, T[]> {
  const grouped = new Map<string, T[]>();
  for (const line of lines) {
    const group = grouped.get(line.item);
    if (group) {
      group.push(line);
    } else {
      grouped.set(line.item, [line]);
    }
  }
  return grouped;
}

export function compareLine(
  bom: BestellijstLine | null,
  target: TargetLine | null,
  tolerance: number = QUANTITY_TOLERANCE
): ComparisonStatus {
  if (!bom) return 'only_in_target';
  if (!target) return 'only_in_bom';
  if (Math.abs(bom.total_quantity - target.total_quantity) > tolerance) {
    return 'quantity_differs';
  }
  if (bom.product_name.trim() !== target.product_name.trim()) {
    return 'name_differs';
  }
  return 'match';
}

function toRow(
  item: string,
  bom: BestellijstLine | null,
  target: TargetLine | null,
  tolerance: number
): ComparisonRow {
  const status = compareLine(bom, target, tolerance);
  return {
    item,
    product_name_bom: bom ? bom.product_name : null,
    total_quantity_bom: bom ? bom.total_quantity : null,
    product_name_target: target ? target.product_name : null,
    total_quantity_target: target ? target.total_quantity : null,
    status,
    label: COMPARISON_LABELS[status]
  };
}

export function compareWithTarget(
  bomLines: readonly BestellijstLine[],
  targetLines: readonly TargetLine[],
  tolerance: number = QUANTITY_TOLERANCE
): ComparisonRow[] {
  const bomByItem = groupByItem(bomLines);
  const targetByItem = groupByItem(targetLines);

  const items = [...new Set([...bomByItem.keys(), ...targetByItem.keys()])]
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

  const rows: ComparisonRow[] = [];
  for (const item of items) {
    const bomGroup = bomByItem.get(item);
    const targetGroup = targetByItem.get(item);

    if (!bomGroup) {
      for (const target of targetGroup ?? []) rows.push(toRow(item, null, target, tolerance));
      continue;
    }
    if (!targetGroup) {
      for (const bom of bomGroup) rows.push(toRow(item, bom, null, tolerance));
      continue;
    }
    for (const bom of bomGroup) {
      for (const target of targetGroup) {
        rows.push(toRow(item, bom, target, tolerance));
      }
    }
  }

  return rows;
}

export function summarizeComparison(rows: readonly ComparisonRow[]): ComparisonSummary {
  const summary: ComparisonSummary = {
    match: 0,
    quantity_differs: 0,
    name_differs: 0,
    only_in_bom: 0,
    only_in_target: 0
  };
  for (const row of rows) {
    summary[row.status]++;
  }
  return summary;
}
