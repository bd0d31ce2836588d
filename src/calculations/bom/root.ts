/**
 * Root item resolution - the row with level 0
 */

import { BomRow, BomWarning, RootPolicy } from '../../types';
import { DEFAULT_ROOT_POLICY } from '../../constants';
import { BomError } from '../../utils/errors';

export interface RootResolution {
  root_item: string;
  candidates: string[];
  warnings: BomWarning[];
}

/**
 * Find the root item before any traversal is attempted.
 * Several level-0 rows naming the same item are not ambiguous.
 */
export function resolveRootItem(
  rows: readonly BomRow[],
  policy: RootPolicy = DEFAULT_ROOT_POLICY
): RootResolution {
  const candidates: string[] = [];
  for (const row of rows) {
    if (row.level === 0 && !candidates.includes(row.item)) {
      candidates.push(row.item);
    }
  }

  if (candidates.length === 0) {
    throw new BomError('MISSING_ROOT', 'No root item found (no row with level 0)');
  }

  if (candidates.length === 1) {
    return { root_item: candidates[0], candidates, warnings: [] };
  }

  if (policy === 'strict') {
    throw new BomError(
      'AMBIGUOUS_ROOT',
      `Multiple root items found (level 0): ${candidates.join(', ')}`,
      { candidates }
    );
  }

  const root_item = policy === 'lexical'
    ? candidates.reduce((min, item) => (item < min ? item : min))
    : candidates[0];

  return {
    root_item,
    candidates,
    warnings: [{
      code: 'AMBIGUOUS_ROOT',
      message: `${candidates.length} rows with level 0 (${candidates.join(', ')}); using ${root_item} (${policy === 'lexical' ? 'lexically smallest' : 'first in table'})`,
      item: root_item
    }]
  };
}
