/**
 * Derivation path rendering for audit display
 * "A (×2) → B (×3) → C"  - the last hop is the terminal quantity, no annotation
 */

import { DerivationPath, TraceEntry, TraceReportEntry } from '../../types';

export function formatDerivationPath(path: DerivationPath): string {
  return path
    .map(([item, qty], i) => (i === path.length - 1 ? item : `${item} (×${qty})`))
    .join(' → ');
}

export function buildTraceReport(trace: ReadonlyMap<string, TraceEntry[]>): TraceReportEntry[] {
  return [...trace.keys()]
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map(item => ({
      item,
      paths: (trace.get(item) ?? []).map((entry, i) => ({
        index: i + 1,
        quantity: entry.quantity,
        path: entry.path,
        rendered: formatDerivationPath(entry.path)
      }))
    }));
}
