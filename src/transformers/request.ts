/**
 * Transform /api/v1/bom request bodies into BOM rows, target lines and options
 */

import { BomRow, ExplosionLimits, RawBomRow, RawTargetLine, RootPolicy, TargetLine } from '../types';
import { QUANTITY_TOLERANCE } from '../constants';
import { isRootPolicy } from '../config';
import { BomError } from '../utils/errors';
import { normalizeBomRows, parseTeamcenterCsv } from './teamcenter';
import { normalizeTargetLines, parseD365Workbook } from './d365';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function scalar(value: unknown): string | number | null {
  return typeof value === 'string' || typeof value === 'number' ? value : null;
}

function str(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function toRawBomRow(value: unknown): RawBomRow {
  if (!isObject(value)) return {};
  return {
    parent_item: scalar(value.parent_item),
    item: scalar(value.item),
    quantity_per_parent: scalar(value.quantity_per_parent),
    template: str(value.template),
    make_or_buy: str(value.make_or_buy),
    line_type: str(value.line_type),
    product_name: str(value.product_name),
    level: scalar(value.level)
  };
}

function toRawTargetLine(value: unknown): RawTargetLine {
  if (!isObject(value)) return {};
  return {
    item: scalar(value.item),
    product_name: str(value.product_name),
    total_quantity: scalar(value.total_quantity)
  };
}

/**
 * `csv` wins over `rows` when both are present
 */
export function readBomRows(body: unknown): BomRow[] {
  if (!isObject(body)) {
    throw new BomError('INVALID_INPUT', 'Request body must be a JSON object');
  }
  if (typeof body.csv === 'string' && body.csv.trim() !== '') {
    return parseTeamcenterCsv(body.csv);
  }
  if (Array.isArray(body.rows)) {
    return normalizeBomRows(body.rows.map(toRawBomRow));
  }
  throw new BomError('INVALID_INPUT', 'Missing BOM in request body (expected "csv" or "rows")');
}

/**
 * Target list from `target_lines` and/or a base64 D365 workbook; null when neither is given
 */
export function readTargetLines(body: unknown): TargetLine[] | null {
  if (!isObject(body)) return null;

  const raw: RawTargetLine[] = [];
  let provided = false;

  if (typeof body.d365_xlsx_base64 === 'string' && body.d365_xlsx_base64 !== '') {
    raw.push(...parseD365Workbook(Buffer.from(body.d365_xlsx_base64, 'base64')));
    provided = true;
  }
  if (Array.isArray(body.target_lines)) {
    raw.push(...body.target_lines.map(toRawTargetLine));
    provided = true;
  }

  return provided ? normalizeTargetLines(raw) : null;
}

export interface RequestOptions {
  rootPolicy?: RootPolicy;
  limits?: Partial<Record<keyof ExplosionLimits, unknown>>;
  tolerance: number;
}

export function readOptions(body: unknown): RequestOptions {
  if (!isObject(body)) return { tolerance: QUANTITY_TOLERANCE };

  const limits = isObject(body.limits)
    ? { maxDepth: body.limits.maxDepth, maxPaths: body.limits.maxPaths }
    : undefined;

  const tolerance = typeof body.tolerance === 'number' && Number.isFinite(body.tolerance) && body.tolerance >= 0
    ? body.tolerance
    : QUANTITY_TOLERANCE;

  return {
    rootPolicy: isRootPolicy(body.root_policy) ? body.root_policy : undefined,
    limits,
    tolerance
  };
}
