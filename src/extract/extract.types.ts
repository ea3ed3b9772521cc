/** One order line exactly as read from the source file */
export interface RawTransactionLine {
  invoiceNo: string;
  stockCode: string;
  description: string;
  quantity: string;
  invoiceDate: string;
  unitPrice: string;
  customerId: string;
  country: string;
}

export type RawField = keyof RawTransactionLine;

/** Logical field → column index in the source header */
export type ColumnMapping = Record<RawField, number>;
