export interface SalesSummary {
  /** Σ net_amount, 2 dp */
  net_sales: number;
  /** Σ net_amount over sale lines only */
  gross_sales: number;
  /** Σ net_amount over return lines (≤ 0) */
  returns_value: number;
  line_count: number;
  return_line_count: number;
  /** return lines / all lines × 100, 2 dp */
  return_rate_pct: number;
  invoice_count: number;
  customer_count: number;
}

export interface MonthlySalesResult {
  [month: string]: number;
}

export interface TopProductEntry {
  stock_code: string;
  description: string;
  quantity: number;
  net_sales: number;
}

export interface CountrySalesEntry {
  country: string;
  net_sales: number;
  line_count: number;
}

export interface AnalyticsCache {
  summary: SalesSummary;
  monthlySales: MonthlySalesResult;
  topProducts: TopProductEntry[];
  salesByCountry: CountrySalesEntry[];
}
