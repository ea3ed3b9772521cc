import {
  DimCountryRow,
  DimCustomerRow,
  DimDateRow,
  DimProductRow,
} from '../warehouse/warehouse.types';

/** Natural key → surrogate key, per dimension */
export interface DimensionKeys {
  date: Map<string, number>;
  product: Map<string, number>;
  country: Map<string, number>;
  /** Known customers only; see `unknownCustomer` */
  customer: Map<string, number>;
  unknownCustomer: number;
}

export interface DimensionSet {
  dates: DimDateRow[];
  products: DimProductRow[];
  countries: DimCountryRow[];
  customers: DimCustomerRow[];
  keys: DimensionKeys;
}

export type DimensionName = 'dim_date' | 'dim_product' | 'dim_country' | 'dim_customer';

export interface SalesTotals {
  lineCount: number;
  returnCount: number;
  /** Σ quantity × unit price, exact in fixed point */
  netSales: number;
  /** Percentage of lines that are returns, 2 dp */
  returnRatePct: number;
}
