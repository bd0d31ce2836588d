/**
 * Unit tests for D365 target list ingestion
 */

import * as XLSX from 'xlsx';
import {
  coerceQuantity,
  normalizeTargetLines,
  parseD365Workbook
} from '../../src/transformers/d365';

function workbookBuffer(rows: unknown[][]): Buffer {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), 'Export');
  const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  return buffer;
}

describe('D365 Transformer', () => {

  describe('coerceQuantity', () => {

    it('keeps numbers and numeric text', () => {
      expect(coerceQuantity(4)).toBe(4);
      expect(coerceQuantity(' 2.5 ')).toBe(2.5);
    });

    it('treats anything else as 0', () => {
      expect(coerceQuantity('n/a')).toBe(0);
      expect(coerceQuantity('')).toBe(0);
      expect(coerceQuantity(null)).toBe(0);
      expect(coerceQuantity('2,5')).toBe(0);
    });

  });

  describe('normalizeTargetLines', () => {

    it('groups by (item, product name) and sums quantities', () => {
      const lines = normalizeTargetLines([
        { item: 300, product_name: 'Bolt M8', total_quantity: 4 },
        { item: '300', product_name: 'Bolt M8 ', total_quantity: '2' },
        { item: '300', product_name: 'Bolt M8 zinc', total_quantity: 1 },
        { item: '', product_name: 'Blank', total_quantity: 3 }
      ]);

      expect(lines).toEqual([
        { item: '300', product_name: 'Bolt M8', total_quantity: 6 },
        { item: '300', product_name: 'Bolt M8 zinc', total_quantity: 1 }
      ]);
    });

  });

  describe('parseD365Workbook', () => {

    it('reads the first sheet with D365 headers', () => {
      const buffer = workbookBuffer([
        ['Item number', 'Product name', ' Quantity', 'Warehouse'],
        [300, 'Bolt M8', 4, 'WH1'],
        ['300', 'Bolt M8', '2', 'WH2'],
        ['L400', 'Profile', 'n/a', 'WH1']
      ]);

      expect(parseD365Workbook(buffer)).toEqual([
        { item: '300', product_name: 'Bolt M8', total_quantity: 6 },
        { item: 'L400', product_name: 'Profile', total_quantity: 0 }
      ]);
    });

    it('returns no lines for a sheet with only headers', () => {
      const buffer = workbookBuffer([['Item number', 'Product name', 'Quantity']]);

      expect(parseD365Workbook(buffer)).toEqual([]);
    });

  });

});
