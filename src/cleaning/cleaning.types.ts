import { Money } from '../common/money';

/** A validated, typed order line ready for dimensional modelling */
export interface CleanTransactionLine {
  invoiceNo: string;
  stockCode: string;
  description: string;
  /** Signed, never 0; negative means a return */
  quantity: number;
  unitPrice: Money;
  invoiceDate: Date;
  /** null when the source has no customer */
  customerId: string | null;
  country: string;
  isReturn: boolean;
}

export interface CleaningStats {
  total: number;
  kept: number;
  dropped: number;
  missingFields: number;
  invalidQuantity: number;
  zeroQuantity: number;
  invalidPrice: number;
  nonPositivePrice: number;
  invalidDate: number;
  duplicates: number;
  /** Kept rows mapped to the unknown customer */
  unknownCustomer: number;
}

export interface CleaningResult {
  lines: CleanTransactionLine[];
  stats: CleaningStats;
}
