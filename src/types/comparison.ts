/**
 * Reconciliation Types
 * Bestellijst vs externally supplied target list (D365)
 */

export interface TargetLine {
  item: string;
  product_name: string;
  total_quantity: number;
}

export interface RawTargetLine {
  item?: string | number | null;
  product_name?: string | null;
  total_quantity?: string | number | null;
}

export type ComparisonStatus =
  | 'match'
  | 'quantity_differs'
  | 'name_differs'
  | 'only_in_bom'
  | 'only_in_target';

export interface ComparisonRow {
  item: string;
  product_name_bom: string | null;
  total_quantity_bom: number | null;
  product_name_target: string | null;
  total_quantity_target: number | null;
  status: ComparisonStatus;
  label: string;
}

export type ComparisonSummary = Record<ComparisonStatus, number>;
