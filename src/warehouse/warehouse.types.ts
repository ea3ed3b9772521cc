export interface DimDateRow {
  date_key: number;
  full_date: string;
  year: number;
  month: number;
  day: number;
  weekday: number;
  weekday_name: string;
  month_name: string;
  quarter: number;
}

export interface DimProductRow {
  product_key: number;
  stock_code: string;
  description: string;
}

export interface DimCountryRow {
  country_key: number;
  country: string;
}

export interface DimCustomerRow {
  customer_key: number;
  customer_id: string | null;
  country_key: number | null;
  is_unknown: boolean;
}

export interface FactSalesRow {
  sales_key: number;
  date_key: number;
  product_key: number;
  customer_key: number;
  country_key: number;
  invoice_no: string;
  invoice_datetime: string;
  quantity: number;
  unit_price: number;
  net_amount: number;
  is_return: boolean;
}

/** Everything one run loads into the warehouse */
export interface WarehouseTables {
  dates: DimDateRow[];
  products: DimProductRow[];
  countries: DimCountryRow[];
  customers: DimCustomerRow[];
  facts: FactSalesRow[];
}

export interface WarehouseWriteResult {
  dim_date: number;
  dim_product: number;
  dim_country: number;
  dim_customer: number;
  fact_sales: number;
}
