/**
 * BOM Explosion Constants
 * Teamcenter export layout, classification keywords and traversal limits
 */

import { ComparisonStatus, ExplosionLimits, RootPolicy } from '../types';

export const CALCULATION_VERSION = 'bom-explode-v1.0.0';

// ============================================================================
// CLASSIFICATION KEYWORDS (case-insensitive substring match)
// ============================================================================

export const CLASSIFICATION_KEYWORDS = {
  purchased: 'purch',
  production: 'production',
  phantom: 'phantom',
  length_template: 'mm'
} as const;

// ============================================================================
// TEAMCENTER EXPORT
// ============================================================================

export const TEAMCENTER_CSV = {
  delimiter: '(#)',
  encoding: 'latin1'
} as const;

/**
 * Normalized Teamcenter header → BomRow field
 */
export const TEAMCENTER_COLUMNS = {
  parentpart: 'parent_item',
  item: 'item',
  qtyper: 'quantity_per_parent',
  template: 'template',
  makebuy: 'make_or_buy',
  linetype: 'line_type',
  productname: 'product_name',
  level: 'level'
} as const;

export const REQUIRED_TEAMCENTER_COLUMNS = ['parentpart', 'item', 'qtyper', 'level'] as const;

/** Stored for a level 0 row whose Qty Per is empty */
export const ROOT_ROW_QUANTITY = 1;

/** Plain decimal or exponent notation, after comma → dot conversion */
export const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// ============================================================================
// D365 EXPORT
// ============================================================================

/**
 * Lower-cased D365 header → TargetLine field
 */
export const D365_COLUMNS = {
  'item number': 'item',
  'product name': 'product_name',
  'quantity': 'total_quantity'
} as const;

// ============================================================================
// TRAVERSAL LIMITS
// ============================================================================

export const DEFAULT_EXPLOSION_LIMITS: ExplosionLimits = {
  maxDepth: 64,
  maxPaths: 250_000
};

export const DEFAULT_ROOT_POLICY: RootPolicy = 'first';

export const ROOT_POLICIES: readonly RootPolicy[] = ['first', 'strict', 'lexical'];

// ============================================================================
// RECONCILIATION
// ============================================================================

export const QUANTITY_TOLERANCE = 0.01;

export const COMPARISON_LABELS: Record<ComparisonStatus, string> = {
  match: '✅ Match',
  quantity_differs: '⚠️ Quantity differs',
  name_differs: '⚠️ Name differs',
  only_in_bom: '❌ Only in BOM',
  only_in_target: '❌ Only in target list'
};

export const EXPORT_FILE_NAME = 'BOM_Comparison_Result.xlsx';
