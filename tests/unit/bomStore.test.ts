/**
 * Unit tests for the stored BOM mapping (no database access)
 */

import { fetchStoredBomRows, storedLineToRawRow, StoredBomLine } from '../../src/services/bomStore';
import { isDatabaseConfigured } from '../../src/services/database';
import { readSupabaseCredentials } from '../../src/config';
import { normalizeBomRows } from '../../src/transformers/teamcenter';

describe('BOM Store', () => {

  const line: StoredBomLine = {
    bom_id: 'bom-1',
    line_no: 2,
    parent_part: 'R100',
    item: 'B300',
    qty_per: '1,5',
    template: null,
    make_buy: 'Purchased',
    line_type: 'Item',
    product_name: 'Bolt M8',
    level: 2
  };

  it('maps a bom_lines record onto a BOM row', () => {
    expect(normalizeBomRows([storedLineToRawRow(line)])).toEqual([{
      parent_item: 'R100',
      item: 'B300',
      quantity_per_parent: 1.5,
      template: '',
      make_or_buy: 'Purchased',
      line_type: 'Item',
      product_name: 'Bolt M8',
      level: 2
    }]);
  });

  describe('without credentials', () => {

    const saved = { url: process.env.SUPABASE_URL, key: process.env.SUPABASE_ANON_KEY };

    function restore(name: 'SUPABASE_URL' | 'SUPABASE_ANON_KEY', value: string | undefined): void {
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }

    beforeEach(() => {
      process.env.SUPABASE_URL = 'your_supabase_url_here';
      process.env.SUPABASE_ANON_KEY = 'your_supabase_anon_key_here';
    });

    afterEach(() => {
      restore('SUPABASE_URL', saved.url);
      restore('SUPABASE_ANON_KEY', saved.key);
    });

    it('treats the .env.example placeholders as not configured', () => {
      expect(isDatabaseConfigured()).toBe(false);
    });

    it('refuses to load when the database is not configured', async () => {
      await expect(fetchStoredBomRows('bom-1')).rejects.toThrow('Database not configured');
    });

    it('picks up credentials set after import', () => {
      process.env.SUPABASE_URL = 'http://localhost:54321';
      process.env.SUPABASE_ANON_KEY = 'test-anon-key';

      expect(isDatabaseConfigured()).toBe(true);
    });

  });

  describe('readSupabaseCredentials', () => {

    it('returns trimmed credentials', () => {
      expect(readSupabaseCredentials({ SUPABASE_URL: ' http://localhost:54321 ', SUPABASE_ANON_KEY: 'test-anon-key' }))
        .toEqual({ url: 'http://localhost:54321', anonKey: 'test-anon-key' });
    });

    it('returns null when a value is missing or a placeholder', () => {
      expect(readSupabaseCredentials({ SUPABASE_URL: 'http://localhost:54321' })).toBeNull();
      expect(readSupabaseCredentials({ SUPABASE_URL: 'http://localhost:54321', SUPABASE_ANON_KEY: '' })).toBeNull();
      expect(readSupabaseCredentials({
        SUPABASE_URL: 'http://localhost:54321',
        SUPABASE_ANON_KEY: 'your_supabase_anon_key_here'
      })).toBeNull();
    });

  });

});
