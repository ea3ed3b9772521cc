import { CleaningService, normaliseCustomerId } from './cleaning.service';
import { rawLine } from '../../test/warehouse-test-utils';

describe('CleaningService', () => {
  let service: CleaningService;

  beforeEach(() => {
    service = new CleaningService();
  });

  describe('valid row', () => {
    it('returns a typed line for a fully valid row', () => {
      const result = service.cleanRow(rawLine(), 1);
      expect(result).not.toBeNull();
      expect(result?.invoiceNo).toBe('536365');
      expect(result?.stockCode).toBe('85123A');
      expect(result?.quantity).toBe(6);
      expect(result?.unitPrice).toBe(25_500);
      expect(result?.invoiceDate.toISOString()).toBe('2010-12-01T08:26:00.000Z');
      expect(result?.customerId).toBe('17850');
      expect(result?.country).toBe('United Kingdom');
      expect(result?.isReturn).toBe(false);
    });

    it('flags negative quantities as returns', () => {
      const result = service.cleanRow(rawLine({ invoiceNo: 'C536379', quantity: '-3', unitPrice: '5.00' }), 1);
      expect(result?.quantity).toBe(-3);
      expect(result?.unitPrice).toBe(50_000);
      expect(result?.isReturn).toBe(true);
    });

    it('trims text fields', () => {
      const result = service.cleanRow(
        rawLine({ stockCode: ' 22350 ', description: 'CAT BOWL ', country: ' France ' }),
        1,
      );
      expect(result?.stockCode).toBe('22350');
      expect(result?.description).toBe('CAT BOWL');
      expect(result?.country).toBe('France');
    });

    it('records a blank country as Unspecified', () => {
      expect(service.cleanRow(rawLine({ country: '' }), 1)?.country).toBe('Unspecified');
    });

    it('accepts a float-formatted whole quantity', () => {
      expect(service.cleanRow(rawLine({ quantity: '12.0' }), 1)?.quantity).toBe(12);
    });
  });

  describe('missing required fields', () => {
    it('drops a row without a stock code', () => {
      expect(service.cleanRow(rawLine({ stockCode: '  ' }), 1)).toBeNull();
      expect(service.getStats().missingFields).toBe(1);
    });

    it('drops a row without a quantity', () => {
      expect(service.cleanRow(rawLine({ quantity: '' }), 1)).toBeNull();
      expect(service.getStats().missingFields).toBe(1);
    });
  });

  describe('quantity handling', () => {
    it.each(['abc', '1.5', '2x'])('drops non-integer quantity %p', (quantity) => {
      expect(service.cleanRow(rawLine({ quantity }), 1)).toBeNull();
      expect(service.getStats().invalidQuantity).toBe(1);
    });

    it('drops a quantity whose line amount cannot be held exactly', () => {
      expect(service.cleanRow(rawLine({ quantity: '99999999999', unitPrice: '1000.0001' }), 1)).toBeNull();
      expect(service.getStats().invalidQuantity).toBe(1);
    });

    it('keeps a large quantity whose line amount is still exact', () => {
      const line = service.cleanRow(rawLine({ quantity: '80995', unitPrice: '2.08' }), 1);
      expect(line?.quantity).toBe(80995);
      expect(service.getStats().invalidQuantity).toBe(0);
    });

    it('drops zero quantity', () => {
      expect(service.cleanRow(rawLine({ quantity: '0' }), 1)).toBeNull();
      expect(service.getStats().zeroQuantity).toBe(1);
    });
  });

  describe('price handling', () => {
    it('drops an unparseable price', () => {
      expect(service.cleanRow(rawLine({ unitPrice: 'n/a' }), 1)).toBeNull();
      expect(service.getStats().invalidPrice).toBe(1);
    });

    it.each(['0', '0.00', '-11062.06'])('drops non-positive price %p', (unitPrice) => {
      expect(service.cleanRow(rawLine({ unitPrice }), 1)).toBeNull();
      expect(service.getStats().nonPositivePrice).toBe(1);
    });

    it('strips thousands separators', () => {
      expect(service.cleanRow(rawLine({ unitPrice: '1,250.00' }), 1)?.unitPrice).toBe(12_500_000);
    });
  });

  describe('date handling', () => {
    it('drops an unparseable invoice date', () => {
      expect(service.cleanRow(rawLine({ invoiceDate: 'yesterday' }), 1)).toBeNull();
      expect(service.getStats().invalidDate).toBe(1);
    });

    it('drops a missing invoice date', () => {
      expect(service.cleanRow(rawLine({ invoiceDate: '' }), 1)).toBeNull();
      expect(service.getStats().invalidDate).toBe(1);
    });
  });

  describe('customer id normalisation', () => {
    it.each([
      ['17850.0', '17850'],
      ['17850', '17850'],
      [' 12583 ', '12583'],
      ['', null],
      ['nan', null],
      ['<NA>', null],
    ])('maps %p to %p', (input, expected) => {
      expect(normaliseCustomerId(input)).toBe(expected);
    });
  });

  describe('clean', () => {
    it('removes exact duplicates and keeps the first occurrence', () => {
      const { lines, stats } = service.clean([
        rawLine(),
        rawLine({ quantity: '8' }),
        rawLine(),
        // Same cleaned values once the float id is normalised
        rawLine({ customerId: '17850' }),
      ]);

      expect(lines).toHaveLength(2);
      expect(lines.map((l) => l.quantity)).toEqual([6, 8]);
      expect(stats.duplicates).toBe(2);
      expect(stats.dropped).toBe(2);
      expect(stats.kept).toBe(2);
      expect(stats.total).toBe(4);
    });

    it('keeps two orders that differ only by invoice', () => {
      const { lines } = service.clean([rawLine(), rawLine({ invoiceNo: '536366' })]);
      expect(lines).toHaveLength(2);
    });

    it('counts unknown customers without dropping them', () => {
      const { lines, stats } = service.clean([rawLine({ customerId: '' }), rawLine({ customerId: 'nan', quantity: '2' })]);
      expect(lines).toHaveLength(2);
      expect(lines.every((l) => l.customerId === null)).toBe(true);
      expect(stats.unknownCustomer).toBe(2);
      expect(stats.dropped).toBe(0);
    });

    it('starts stats fresh on every call', () => {
      service.clean([rawLine({ quantity: '0' })]);
      const { stats } = service.clean([rawLine()]);
      expect(stats.total).toBe(1);
      expect(stats.zeroQuantity).toBe(0);
    });

    it('never throws on malformed rows', () => {
      const { lines, stats } = service.clean([
        rawLine({ stockCode: '' }),
        rawLine({ quantity: 'x' }),
        rawLine({ unitPrice: '' }),
        rawLine({ invoiceDate: '??' }),
      ]);
      expect(lines).toEqual([]);
      expect(stats.dropped).toBe(4);
    });
  });
});
