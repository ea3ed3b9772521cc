import { Injectable, Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import {
  AnalyticsCache,
  CountrySalesEntry,
  MonthlySalesResult,
  SalesSummary,
  TopProductEntry,
} from './analytics.types';
import { SLOW_QUERY_THRESHOLD_MS, TOP_PRODUCTS_LIMIT } from '../common/constants';
import { errorMessage } from '../common/errors';
import { roundTo } from '../common/money';

const EMPTY_SUMMARY: SalesSummary = {
  net_sales: 0,
  gross_sales: 0,
  returns_value: 0,
  line_count: 0,
  return_line_count: 0,
  return_rate_pct: 0,
  invoice_count: 0,
  customer_count: 0,
};

interface SummaryRow {
  line_count: number;
  return_line_count: number | null;
  net_sales: number | null;
  gross_sales: number | null;
  returns_value: number | null;
  invoice_count: number;
  customer_count: number;
}

@Injectable()
export class AnalyticsService {
  private readonly logger = new Logger(AnalyticsService.name);
  private cache: Partial<AnalyticsCache> = {};
  isReady = false;
  isComputing = false;

  constructor(private readonly dataSource: DataSource) {}

  /**
   * Runs every metric query against the loaded warehouse and caches the results.
   * A failing query keeps its previous cached value; the others still land.
   */
  async precompute(): Promise<void> {
    this.isComputing = true;
    this.logger.log('Pre-computing analytics...');
    const start = Date.now();

    const [summary, monthlySales, topProducts, salesByCountry] = await Promise.allSettled([
      this.timed('summary', () => this.querySummary()),
      this.timed('monthly-sales', () => this.queryMonthlySales()),
      this.timed('top-products', () => this.queryTopProducts()),
      this.timed('sales-by-country', () => this.querySalesByCountry()),
    ]);

    const failed: string[] = [];

    if (summary.status === 'fulfilled') {
      this.cache.summary = summary.value;
    } else {
      failed.push(`summary: ${errorMessage(summary.reason)}`);
    }

    if (monthlySales.status === 'fulfilled') {
      this.cache.monthlySales = monthlySales.value;
    } else {
      failed.push(`monthly-sales: ${errorMessage(monthlySales.reason)}`);
    }

    if (topProducts.status === 'fulfilled') {
      this.cache.topProducts = topProducts.value;
    } else {
      failed.push(`top-products: ${errorMessage(topProducts.reason)}`);
    }

    if (salesByCountry.status === 'fulfilled') {
      this.cache.salesByCountry = salesByCountry.value;
    } else {
      failed.push(`sales-by-country: ${errorMessage(salesByCountry.reason)}`);
    }

    // Partial cache beats a permanent 503
    this.isReady = true;
    this.isComputing = false;

    const totalMs = Date.now() - start;
    if (failed.length > 0) {
      this.logger.warn(
        `Analytics ready with ${failed.length} failed query(ies) in ${totalMs}ms: ${failed.join(', ')}`,
      );
    } else {
      this.logger.log(`Analytics ready in ${totalMs}ms`);
    }
  }

  /** Headline totals: net sales and return rate */
  getSummary(): SalesSummary {
    return this.cache.summary ?? { ...EMPTY_SUMMARY };
  }

  /** Net sales per calendar month, keyed YYYY-MM */
  getMonthlySales(): MonthlySalesResult {
    return this.cache.monthlySales ?? {};
  }

  getTopProducts(): TopProductEntry[] {
    return this.cache.topProducts ?? [];
  }

  getSalesByCountry(): CountrySalesEntry[] {
    return this.cache.salesByCountry ?? [];
  }

  /**
   * Wraps a query in execution-time logging.
   * Warns if the query exceeds SLOW_QUERY_THRESHOLD_MS.
   */
  private async timed<T>(name: string, fn: () => Promise<T>): Promise<T> {
    const start = Date.now();
    const result = await fn();
    const ms = Date.now() - start;

    if (ms > SLOW_QUERY_THRESHOLD_MS) {
      this.logger.warn(`Slow query [${name}]: ${ms}ms`);
    } else {
      this.logger.log(`Query [${name}]: ${ms}ms`);
    }

    return result;
  }

  private async querySummary(): Promise<SalesSummary> {
    const rows: SummaryRow[] = await this.dataSource.query(`
      SELECT
        COUNT(*) AS line_count,
        SUM(is_return) AS return_line_count,
        SUM(net_amount) AS net_sales,
        SUM(CASE WHEN is_return = 0 THEN net_amount ELSE 0 END) AS gross_sales,
        SUM(CASE WHEN is_return = 1 THEN net_amount ELSE 0 END) AS returns_value,
        COUNT(DISTINCT invoice_no) AS invoice_count,
        (SELECT COUNT(*) FROM dim_customer WHERE is_unknown = 0) AS customer_count
      FROM fact_sales
    `);

    const [row] = rows;
    if (!row || row.line_count === 0) {
      return { ...EMPTY_SUMMARY, customer_count: row?.customer_count ?? 0 };
    }

    const returnLines = row.return_line_count ?? 0;
    return {
      net_sales: roundTo(row.net_sales ?? 0, 2),
      gross_sales: roundTo(row.gross_sales ?? 0, 2),
      returns_value: roundTo(row.returns_value ?? 0, 2),
      line_count: row.line_count,
      return_line_count: returnLines,
      return_rate_pct: roundTo((returnLines / row.line_count) * 100, 2),
      invoice_count: row.invoice_count,
      customer_count: row.customer_count,
    };
  }

  private async queryMonthlySales(): Promise<MonthlySalesResult> {
    const rows: { month: string; net_sales: number }[] = await this.dataSource.query(`
      SELECT printf('%04d-%02d', d.year, d.month) AS month, SUM(f.net_amount) AS net_sales
      FROM fact_sales f
      JOIN dim_date d ON d.date_key = f.date_key
      GROUP BY d.year, d.month
      ORDER BY d.year, d.month
    `);

    return rows.reduce((acc: MonthlySalesResult, row) => {
      acc[row.month] = roundTo(row.net_sales, 2);
      return acc;
    }, {});
  }

  private async queryTopProducts(): Promise<TopProductEntry[]> {
    const rows: TopProductEntry[] = await this.dataSource.query(
      `
      SELECT p.stock_code, p.description, SUM(f.quantity) AS quantity, SUM(f.net_amount) AS net_sales
      FROM fact_sales f
      JOIN dim_product p ON p.product_key = f.product_key
      GROUP BY p.product_key
      ORDER BY net_sales DESC, p.stock_code ASC
      LIMIT ?
    `,
      [TOP_PRODUCTS_LIMIT],
    );

    return rows.map((row) => ({ ...row, net_sales: roundTo(row.net_sales, 2) }));
  }

  private async querySalesByCountry(): Promise<CountrySalesEntry[]> {
    const rows: CountrySalesEntry[] = await this.dataSource.query(`
      SELECT c.country, SUM(f.net_amount) AS net_sales, COUNT(*) AS line_count
      FROM fact_sales f
      JOIN dim_country c ON c.country_key = f.country_key
      GROUP BY c.country_key
      ORDER BY net_sales DESC, c.country ASC
    `);

    return rows.map((row) => ({ ...row, net_sales: roundTo(row.net_sales, 2) }));
  }
}
