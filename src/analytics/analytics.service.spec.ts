import { DataSource } from 'typeorm';
import { AnalyticsService } from './analytics.service';
import { WarehouseWriterService } from '../warehouse/warehouse-writer.service';
import { DimensionBuilderService } from '../modeling/dimension-builder.service';
import { FactBuilderService } from '../modeling/fact-builder.service';
import { CleanTransactionLine } from '../cleaning/cleaning.types';
import { cleanLine, createWarehouseDataSource } from '../../test/warehouse-test-utils';

async function load(dataSource: DataSource, lines: CleanTransactionLine[]): Promise<void> {
  const dims = new DimensionBuilderService().build(lines);
  await new WarehouseWriterService(dataSource).write({
    dates: dims.dates,
    products: dims.products,
    countries: dims.countries,
    customers: dims.customers,
    facts: new FactBuilderService().build(lines, dims),
  });
}

describe('AnalyticsService', () => {
  let dataSource: DataSource;
  let service: AnalyticsService;

  // UK: 6 × 2.55 + 12 × 1.25 = 30.30; France: 24 × 3.75 − 3 × 5.00 = 75.00; Jan: 10 × 0.85 = 8.50 (UK)
  const lines = [
    cleanLine({ invoiceNo: '536365', stockCode: '85123A', quantity: 6, unitPrice: 25_500, customerId: '17850' }),
    cleanLine({ invoiceNo: '536365', stockCode: '22633', quantity: 12, unitPrice: 12_500, customerId: '17850' }),
    cleanLine({
      invoiceNo: '536370',
      stockCode: '22728',
      quantity: 24,
      unitPrice: 37_500,
      customerId: '12583',
      country: 'France',
    }),
    cleanLine({
      invoiceNo: 'C536379',
      stockCode: '22633',
      quantity: -3,
      unitPrice: 50_000,
      customerId: null,
      country: 'France',
    }),
    cleanLine({
      invoiceNo: '539993',
      stockCode: '85123A',
      quantity: 10,
      unitPrice: 8_500,
      customerId: '17850',
      invoiceDate: '2011-01-04 10:00:00',
    }),
  ];

  beforeEach(async () => {
    dataSource = await createWarehouseDataSource();
    service = new AnalyticsService(dataSource);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await dataSource.destroy();
  });

  describe('before precompute', () => {
    it('is not ready', () => {
      expect(service.isReady).toBe(false);
    });

    it('returns empty results', () => {
      expect(service.getSummary().net_sales).toBe(0);
      expect(service.getMonthlySales()).toEqual({});
      expect(service.getTopProducts()).toEqual([]);
      expect(service.getSalesByCountry()).toEqual([]);
    });
  });

  describe('getSummary', () => {
    it('reports net sales as the sum of net amounts', async () => {
      await load(dataSource, lines);
      await service.precompute();

      expect(service.getSummary()).toEqual({
        net_sales: 113.8,
        gross_sales: 128.8,
        returns_value: -15,
        line_count: 5,
        return_line_count: 1,
        return_rate_pct: 20,
        invoice_count: 4,
        customer_count: 2,
      });
    });

    it('agrees with the fixed-point total computed before the load', async () => {
      await load(dataSource, lines);
      await service.precompute();

      expect(service.getSummary().net_sales).toBe(new FactBuilderService().totals(lines).netSales);
    });

    it('reports zeros for an empty warehouse', async () => {
      await load(dataSource, []);
      await service.precompute();

      expect(service.getSummary()).toEqual({
        net_sales: 0,
        gross_sales: 0,
        returns_value: 0,
        line_count: 0,
        return_line_count: 0,
        return_rate_pct: 0,
        invoice_count: 0,
        customer_count: 0,
      });
    });
  });

  describe('getMonthlySales', () => {
    it('keys net sales by YYYY-MM in order', async () => {
      await load(dataSource, lines);
      await service.precompute();

      const result = service.getMonthlySales();
      expect(Object.keys(result)).toEqual(['2010-12', '2011-01']);
      expect(result['2010-12']).toBe(105.3);
      expect(result['2011-01']).toBe(8.5);
    });
  });

  describe('getTopProducts', () => {
    it('orders products by net sales, returns included', async () => {
      await load(dataSource, lines);
      await service.precompute();

      expect(service.getTopProducts()).toEqual([
        { stock_code: '22728', description: 'WHITE HANGING HEART T-LIGHT HOLDER', quantity: 24, net_sales: 90 },
        { stock_code: '85123A', description: 'WHITE HANGING HEART T-LIGHT HOLDER', quantity: 16, net_sales: 23.8 },
        { stock_code: '22633', description: 'WHITE HANGING HEART T-LIGHT HOLDER', quantity: 9, net_sales: 0 },
      ]);
    });
  });

  describe('getSalesByCountry', () => {
    it('orders countries by net sales', async () => {
      await load(dataSource, lines);
      await service.precompute();

      expect(service.getSalesByCountry()).toEqual([
        { country: 'France', net_sales: 75, line_count: 2 },
        { country: 'United Kingdom', net_sales: 38.8, line_count: 3 },
      ]);
    });
  });

  describe('precompute resilience', () => {
    it('sets isReady and clears isComputing', async () => {
      await load(dataSource, lines);
      await service.precompute();
      expect(service.isReady).toBe(true);
      expect(service.isComputing).toBe(false);
    });

    it('keeps the previous values of queries that fail', async () => {
      await load(dataSource, lines);
      await service.precompute();

      jest.spyOn(dataSource, 'query').mockRejectedValue(new Error('database is locked'));
      await service.precompute();

      expect(service.isReady).toBe(true);
      expect(service.getSummary().net_sales).toBe(113.8);
      expect(service.getSalesByCountry()).toHaveLength(2);
    });

    it('becomes ready with empty results when every query fails', async () => {
      jest.spyOn(dataSource, 'query').mockRejectedValue(new Error('no such table: fact_sales'));
      await service.precompute();

      expect(service.isReady).toBe(true);
      expect(service.getMonthlySales()).toEqual({});
    });
  });
});
