/**
 * Unit tests for Teamcenter export ingestion
 */

import {
  normalizeHeader,
  parseQuantity,
  parseLevel,
  normalizeBomRows,
  parseTeamcenterCsv
} from '../../src/transformers/teamcenter';
import { BomError } from '../../src/utils/errors';

const HEADER = 'Level(#)Parent Part(#)Item(#)Qty Per(#)Template(#)Make/Buy(#)Line Type(#)Product Name';

function csv(...lines: string[]): string {
  return [HEADER, ...lines].join('\n');
}

function captureBomError(fn: () => unknown): BomError {
  try {
    fn();
  } catch (error) {
    if (error instanceof BomError) return error;
    throw error;
  }
  throw new Error('Expected a BomError');
}

describe('Teamcenter Transformer', () => {

  describe('normalizeHeader', () => {

    it('strips, lower-cases and removes non-word characters', () => {
      expect(normalizeHeader(' Qty Per ')).toBe('qtyper');
      expect(normalizeHeader('Make/Buy')).toBe('makebuy');
      expect(normalizeHeader('Parent Part')).toBe('parentpart');
    });

  });

  describe('parseQuantity', () => {

    it('converts comma decimals', () => {
      expect(parseQuantity('1,5')).toBe(1.5);
      expect(parseQuantity(' 2 ')).toBe(2);
      expect(parseQuantity(0.25)).toBe(0.25);
    });

    it('rejects empty, non-numeric and non-finite values', () => {
      expect(parseQuantity('')).toBeNull();
      expect(parseQuantity('abc')).toBeNull();
      expect(parseQuantity('1,000.5')).toBeNull();
      expect(parseQuantity(Number.NaN)).toBeNull();
      expect(parseQuantity(null)).toBeNull();
    });

  });

  describe('parseLevel', () => {

    it('parses integer levels', () => {
      expect(parseLevel('0')).toBe(0);
      expect(parseLevel(' 3 ')).toBe(3);
      expect(parseLevel(2)).toBe(2);
    });

    it('returns null for empty or non-integer levels', () => {
      expect(parseLevel('')).toBeNull();
      expect(parseLevel('1.5')).toBeNull();
      expect(parseLevel(undefined)).toBeNull();
    });

  });

  describe('parseTeamcenterCsv', () => {

    it('parses "(#)"-separated rows into BomRow records', () => {
      const rows = parseTeamcenterCsv(csv(
        '0(#)(#)R100(#)1(#)(#)Production(#)Item(#)Frame assembly',
        '2(#)P200(#)B300(#)1,5(#)(#)Purchased(#)Item(#)Bolt M8 '
      ));

      expect(rows).toEqual([
        {
          parent_item: '',
          item: 'R100',
          quantity_per_parent: 1,
          template: '',
          make_or_buy: 'Production',
          line_type: 'Item',
          product_name: 'Frame assembly',
          level: 0
        },
        {
          parent_item: 'P200',
          item: 'B300',
          quantity_per_parent: 1.5,
          template: '',
          make_or_buy: 'Purchased',
          line_type: 'Item',
          product_name: 'Bolt M8',
          level: 2
        }
      ]);
    });

    it('decodes a Buffer as ISO-8859-1', () => {
      const buffer = Buffer.from(csv('1(#)R100(#)W700(#)4(#)(#)Purchased(#)Item(#)Ring ø8'), 'latin1');

      expect(parseTeamcenterCsv(buffer)[0].product_name).toBe('Ring ø8');
    });

    it('skips empty lines', () => {
      const rows = parseTeamcenterCsv(csv(
        '0(#)(#)R100(#)1(#)(#)Production(#)Item(#)Frame',
        '',
        '1(#)R100(#)A(#)2(#)(#)Purchased(#)Item(#)Part'
      ));

      expect(rows.map(r => r.item)).toEqual(['R100', 'A']);
    });

    it('fills optional columns with empty strings', () => {
      const rows = parseTeamcenterCsv('Level(#)Parent Part(#)Item(#)Qty Per\n1(#)R(#)A(#)2');

      expect(rows[0]).toEqual({
        parent_item: 'R',
        item: 'A',
        quantity_per_parent: 2,
        template: '',
        make_or_buy: '',
        line_type: '',
        product_name: '',
        level: 1
      });
    });

    it('reports every malformed quantity in one error', () => {
      const error = captureBomError(() => parseTeamcenterCsv(csv(
        '0(#)(#)R100(#)1(#)(#)Production(#)Item(#)Frame',
        '1(#)R100(#)A(#)abc(#)(#)Purchased(#)Item(#)Part A',
        '1(#)R100(#)B(#)(#)(#)Purchased(#)Item(#)Part B'
      )));

      expect(error.code).toBe('MALFORMED_QUANTITY');
      expect(error.details).toEqual([
        { row: 2, value: 'abc' },
        { row: 3, value: '' }
      ]);
    });

    it('accepts an empty quantity on the root row', () => {
      const rows = parseTeamcenterCsv(csv(
        '0(#)(#)R100(#)(#)(#)Production(#)Item(#)Frame',
        '1(#)R100(#)A(#)2(#)(#)Purchased(#)Item(#)Part A'
      ));

      expect(rows.map(r => [r.item, r.quantity_per_parent, r.level])).toEqual([
        ['R100', 1, 0],
        ['A', 2, 1]
      ]);
    });

    it('still rejects non-numeric text on the root row', () => {
      const error = captureBomError(() => parseTeamcenterCsv(csv(
        '0(#)(#)R100(#)n/a(#)(#)Production(#)Item(#)Frame'
      )));

      expect(error.details).toEqual([{ row: 1, value: 'n/a' }]);
    });

    it('rejects an export without a required column', () => {
      const error = captureBomError(() =>
        parseTeamcenterCsv('Level(#)Parent Part(#)Item\n0(#)(#)R100')
      );

      expect(error.code).toBe('MISSING_COLUMN');
      expect(error.statusCode).toBe(400);
      expect(error.details).toEqual({
        missing: ['qtyper'],
        found: ['level', 'parentpart', 'item']
      });
    });

    it('returns no rows for a header-only export', () => {
      expect(parseTeamcenterCsv(HEADER)).toEqual([]);
    });

  });

  describe('normalizeBomRows', () => {

    it('normalizes JSON rows with numeric or string fields', () => {
      const rows = normalizeBomRows([
        { parent_item: 100, item: 200, quantity_per_parent: '2,5', make_or_buy: ' Purchased ', level: '1' }
      ]);

      expect(rows).toEqual([{
        parent_item: '100',
        item: '200',
        quantity_per_parent: 2.5,
        template: '',
        make_or_buy: 'Purchased',
        line_type: '',
        product_name: '',
        level: 1
      }]);
    });

    it('rejects a missing quantity', () => {
      expect(() => normalizeBomRows([{ item: 'A', level: 1 }])).toThrow(BomError);
    });

    it('accepts a missing quantity on a level 0 row', () => {
      const rows = normalizeBomRows([{ item: 'R', level: 0 }, { item: 'A', quantity_per_parent: 3, level: '1' }]);

      expect(rows[0].quantity_per_parent).toBe(1);
      expect(rows[1].quantity_per_parent).toBe(3);
    });

  });

});
