/**
 * BOM Explosion Engine
 * Depth-first walk from the root, multiplying quantities along each path.
 *
 *   phantom      → relay multiplier × qty to its children
 *   buy / make   → terminal: add multiplier × qty to the item's total
 *   unknown      → dropped
 *
 * A derivation path is the list of (item, qty) hops from the root. For an edge
 * item → child with quantity q the path is extended with (item, q), and the
 * key (path + (child, q)) is visited at most once per explosion.
 */

import {
  BomWarning,
  ClassifiedBomRow,
  DerivationPath,
  ExplosionLimits,
  ExplosionResult,
  PathStep,
  TraceEntry
} from '../../types';
import { DEFAULT_EXPLOSION_LIMITS } from '../../constants';
import { BomError } from '../../utils/errors';

/**
 * Accumulation state owned by a single explodeBom() call
 */
interface ExplosionContext {
  childrenByParent: Map<string, ClassifiedBomRow[]>;
  limits: ExplosionLimits;
  leafTotals: Map<string, number>;
  lengthTotals: Map<string, number>;
  trace: Map<string, TraceEntry[]>;
  lengthTrace: Map<string, TraceEntry[]>;
  visited: Set<string>;
  warnings: BomWarning[];
}

/**
 * Group rows by parent, keeping table order within each parent
 */
export function indexByParent(
  rows: readonly ClassifiedBomRow[]
): Map<string, ClassifiedBomRow[]> {
  const index = new Map<string, ClassifiedBomRow[]>();
  for (const row of rows) {
    const children = index.get(row.parent_item);
    if (children) {
      children.push(row);
    } else {
      index.set(row.parent_item, [row]);
    }
  }
  return index;
}

export function pathKey(path: DerivationPath): string {
  return JSON.stringify(path);
}

function appendEntry(log: Map<string, TraceEntry[]>, item: string, entry: TraceEntry): void {
  const entries = log.get(item);
  if (entries) {
    entries.push(entry);
  } else {
    log.set(item, [entry]);
  }
}

function addTotal(totals: Map<string, number>, item: string, quantity: number): void {
  totals.set(item, (totals.get(item) ?? 0) + quantity);
}

function traverse(
  ctx: ExplosionContext,
  item: string,
  multiplier: number,
  path: DerivationPath,
  depth: number
): void {
  const children = ctx.childrenByParent.get(item);
  if (!children) return;

  for (const row of children) {
    const child = row.item;
    const qty = row.quantity_per_parent;
    const hop: PathStep = [item, qty];
    const newPath: DerivationPath = [...path, hop];
    const fullPath: DerivationPath = [...newPath, [child, qty]];

    const key = pathKey(fullPath);
    if (ctx.visited.has(key)) continue;
    ctx.visited.add(key);

    if (ctx.visited.size > ctx.limits.maxPaths) {
      throw new BomError(
        'PATH_LIMIT_EXCEEDED',
        `BOM explosion visited more than ${ctx.limits.maxPaths} distinct paths`,
        { max_paths: ctx.limits.maxPaths, item: child }
      );
    }

    const totalQty = multiplier * qty;

    switch (row.classification) {
      case 'buy':
      case 'make': {
        const entry: TraceEntry = { quantity: totalQty, path: fullPath };
        appendEntry(ctx.trace, child, entry);
        if (row.is_length_item) {
          appendEntry(ctx.lengthTrace, child, entry);
          addTotal(ctx.lengthTotals, child, totalQty);
        } else {
          addTotal(ctx.leafTotals, child, totalQty);
        }
        break;
      }

      case 'phantom':
        if (depth + 1 > ctx.limits.maxDepth) {
          ctx.warnings.push({
            code: 'PHANTOM_DEPTH_EXCEEDED',
            message: `Phantom ${child} not expanded: nesting deeper than ${ctx.limits.maxDepth} levels (via ${fullPath.map(([i]) => i).join(' → ')})`,
            item: child
          });
          break;
        }
        traverse(ctx, child, totalQty, newPath, depth + 1);
        break;

      case 'unknown':
        break;
    }
  }
}

/**
 * Explode the BOM below rootItem.
 * A root without children yields empty totals.
 */
export function explodeBom(
  rootItem: string,
  rows: readonly ClassifiedBomRow[],
  limits: Partial<ExplosionLimits> = {}
): ExplosionResult {
  const ctx: ExplosionContext = {
    childrenByParent: indexByParent(rows),
    limits: { ...DEFAULT_EXPLOSION_LIMITS, ...limits },
    leafTotals: new Map(),
    lengthTotals: new Map(),
    trace: new Map(),
    lengthTrace: new Map(),
    visited: new Set(),
    warnings: []
  };

  traverse(ctx, rootItem, 1, [], 0);

  return {
    root_item: rootItem,
    leafTotals: ctx.leafTotals,
    lengthTotals: ctx.lengthTotals,
    trace: ctx.trace,
    lengthTrace: ctx.lengthTrace,
    visitedPaths: ctx.visited.size,
    warnings: ctx.warnings
  };
}
