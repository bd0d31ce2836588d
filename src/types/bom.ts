/**
 * BOM Explosion Types
 * Teamcenter BOM rows, classification and explosion output
 */

// ============================================================================
// INPUT TYPES
// ============================================================================

/**
 * One parent/child edge of the BOM, normalized at ingestion
 */
export interface BomRow {
  /** Parent item identifier ('' for the root row) */
  parent_item: string;

  /** Child item identifier */
  item: string;

  /** Quantity of `item` per one `parent_item` */
  quantity_per_parent: number;

  /** Free text; length items carry "mm" here */
  template: string;

  make_or_buy: string;
  line_type: string;
  product_name: string;

  /** Depth as recorded by Teamcenter, null when missing or not an integer */
  level: number | null;
}

/**
 * Loosely-typed row as it arrives from JSON callers or the BOM store
 */
export interface RawBomRow {
  parent_item?: string | number | null;
  item?: string | number | null;
  quantity_per_parent?: string | number | null;
  template?: string | null;
  make_or_buy?: string | null;
  line_type?: string | null;
  product_name?: string | null;
  level?: string | number | null;
}

export type Classification = 'buy' | 'make' | 'phantom' | 'unknown';

export interface ClassifiedBomRow extends BomRow {
  readonly classification: Classification;
  readonly is_length_item: boolean;
}

export type RootPolicy = 'first' | 'strict' | 'lexical';

// ============================================================================
// EXPLOSION TYPES
// ============================================================================

/** (item, quantity_per_parent) hop on a derivation path */
export type PathStep = readonly [item: string, quantity: number];

export type DerivationPath = readonly PathStep[];

export interface TraceEntry {
  quantity: number;
  path: DerivationPath;
}

export interface ExplosionLimits {
  /** Maximum phantom nesting depth below the root */
  maxDepth: number;

  /** Maximum number of distinct path keys visited in one explosion */
  maxPaths: number;
}

export interface BomWarning {
  code: string;
  message: string;
  item?: string;
}

export interface ExplosionResult {
  root_item: string;
  leafTotals: Map<string, number>;
  lengthTotals: Map<string, number>;
  trace: Map<string, TraceEntry[]>;
  lengthTrace: Map<string, TraceEntry[]>;
  visitedPaths: number;
  warnings: BomWarning[];
}

// ============================================================================
// OUTPUT TYPES
// ============================================================================

export interface BestellijstLine {
  item: string;
  product_name: string;
  total_quantity: number;
}

export interface LengthItemLine extends BestellijstLine {
  template: string;
}

export interface TraceReportPath {
  index: number;
  quantity: number;
  path: DerivationPath;
  rendered: string;
}

export interface TraceReportEntry {
  item: string;
  paths: TraceReportPath[];
}

export interface BestellijstSummary {
  rows_total: number;
  rows_by_classification: Record<Classification, number>;
  leaf_items: number;
  length_items: number;
  visited_paths: number;
}

export interface BestellijstResponse {
  success: boolean;
  root_item: string;
  items: BestellijstLine[];
  length_items: LengthItemLine[];
  trace: TraceReportEntry[];
  summary: BestellijstSummary;
  provenance: {
    calculation_id: string;
    version: string;
    timestamp: string;
    warnings: BomWarning[];
  };
}
