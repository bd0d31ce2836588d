/**
 * BOM Store - Teamcenter exports kept in the Supabase bom_lines table
 */

import { BomRow, RawBomRow } from '../types';
import { normalizeBomRows } from '../transformers/teamcenter';
import { BomError } from '../utils/errors';
import { BOM_LINES_TABLE, getSupabaseClient, isDatabaseConfigured } from './database';

/**
 * Row shape of bom_lines
 */
export interface StoredBomLine {
  bom_id: string;
  line_no: number;
  parent_part: string | null;
  item: string | null;
  qty_per: string | number | null;
  template: string | null;
  make_buy: string | null;
  line_type: string | null;
  product_name: string | null;
  level: number | null;
}

export function storedLineToRawRow(line: StoredBomLine): RawBomRow {
  return {
    parent_item: line.parent_part,
    item: line.item,
    quantity_per_parent: line.qty_per,
    template: line.template,
    make_or_buy: line.make_buy,
    line_type: line.line_type,
    product_name: line.product_name,
    level: line.level
  };
}

export async function fetchStoredBomRows(bomId: string): Promise<BomRow[]> {
  if (!isDatabaseConfigured()) {
    throw new Error('Database not configured - stored BOMs are unavailable');
  }

  const client = getSupabaseClient();
  const { data, error } = await client
    .from(BOM_LINES_TABLE)
    .select('*')
    .eq('bom_id', bomId)
    .order('line_no', { ascending: true })
    .returns<StoredBomLine[]>();

  if (error) {
    console.error('❌ Error fetching BOM lines:', error.message);
    throw new Error(`Failed to load BOM ${bomId}: ${error.message}`);
  }

  if (!data || data.length === 0) {
    throw new BomError('BOM_NOT_FOUND', `No BOM lines found for bom_id ${bomId}`);
  }

  console.log(`✅ Loaded ${data.length} BOM lines for ${bomId}`);
  return normalizeBomRows(data.map(storedLineToRawRow));
}
