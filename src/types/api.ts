/**
 * HTTP response shapes for /api/v1/bom
 */

import { BestellijstResponse } from './bom';
import { ComparisonRow, ComparisonSummary } from './comparison';

export interface CompareResponse extends BestellijstResponse {
  comparison: {
    tolerance: number;
    rows: ComparisonRow[];
    summary: ComparisonSummary;
  };
}

export interface ErrorResponse {
  success: false;
  error: string;
  error_code?: string;
  details?: unknown;
  timestamp: string;
}
