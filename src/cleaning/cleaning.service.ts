import { Injectable, Logger } from '@nestjs/common';
import { RawTransactionLine } from '../extract/extract.types';
import { CleanTransactionLine, CleaningResult, CleaningStats } from './cleaning.types';
import { parseMoney } from '../common/money';
import { parseInvoiceDate } from '../common/dates';
import {
  FLOAT_ID_REGEX,
  UNKNOWN_CUSTOMER_TOKENS,
  UNSPECIFIED_COUNTRY,
} from '../common/constants';

/** Whole numbers, including "12.0" from float exports */
const INTEGER_REGEX = /^[+-]?\d+(?:\.0+)?$/;

const emptyStats = (): CleaningStats => ({
  total: 0,
  kept: 0,
  dropped: 0,
  missingFields: 0,
  invalidQuantity: 0,
  zeroQuantity: 0,
  invalidPrice: 0,
  nonPositivePrice: 0,
  invalidDate: 0,
  duplicates: 0,
  unknownCustomer: 0,
});

@Injectable()
export class CleaningService {
  private readonly logger = new Logger(CleaningService.name);

  private stats: CleaningStats = emptyStats();

  /**
   * Cleans a full extract: type coercion per row, then exact-duplicate removal.
   * Rows are numbered from 1 in source order. Stats start fresh on each call.
   */
  clean(rows: RawTransactionLine[]): CleaningResult {
    this.resetStats();

    const lines: CleanTransactionLine[] = [];
    const seen = new Set<string>();

    rows.forEach((raw, index) => {
      const rowNumber = index + 1;
      const line = this.cleanRow(raw, rowNumber);
      if (!line) return;

      const key = dedupKey(line);
      if (seen.has(key)) {
        this.stats.duplicates++;
        this.stats.dropped++;
        this.logger.warn(`Row ${rowNumber}: exact duplicate of an earlier line — skipping`);
        return;
      }
      seen.add(key);

      if (line.customerId === null) {
        this.stats.unknownCustomer++;
      }
      lines.push(line);
    });

    this.stats.kept = lines.length;
    this.logger.log(
      `Cleaned ${this.stats.total.toLocaleString()} row(s): kept ${this.stats.kept.toLocaleString()}, ` +
        `dropped ${this.stats.dropped}`,
    );

    return { lines, stats: this.getStats() };
  }

  /**
   * Validates and coerces a single raw row.
   * Returns null if the row must be dropped; every drop is counted and logged.
   */
  cleanRow(raw: RawTransactionLine, rowNumber: number): CleanTransactionLine | null {
    this.stats.total++;

    const stockCode = raw.stockCode.trim();
    const quantityText = raw.quantity.trim().replace(/,/g, '');

    // Required fields — a line without a product or a quantity cannot be modelled
    if (!stockCode || !quantityText) {
      return this.drop('missingFields', rowNumber, 'missing stock code or quantity');
    }

    if (!INTEGER_REGEX.test(quantityText)) {
      return this.drop('invalidQuantity', rowNumber, `quantity "${raw.quantity}" is not a whole number`);
    }
    const quantity = Number(quantityText);
    if (quantity === 0) {
      return this.drop('zeroQuantity', rowNumber, 'zero quantity');
    }

    // Unit price — fixed-point; free lines and adjustments (price <= 0) carry no sale
    const unitPrice = parseMoney(raw.unitPrice);
    if (unitPrice === null) {
      return this.drop('invalidPrice', rowNumber, `unit price "${raw.unitPrice}" is not a number`);
    }
    if (unitPrice <= 0) {
      return this.drop('nonPositivePrice', rowNumber, `non-positive unit price ${raw.unitPrice}`);
    }

    // net_amount is computed in ten-thousandths and must stay exact
    if (!Number.isSafeInteger(quantity * unitPrice)) {
      return this.drop('invalidQuantity', rowNumber, `quantity ${raw.quantity} × price ${raw.unitPrice} is out of range`);
    }

    const invoiceDate = parseInvoiceDate(raw.invoiceDate);
    if (!invoiceDate) {
      return this.drop('invalidDate', rowNumber, `unparseable invoice date "${raw.invoiceDate}"`);
    }

    return {
      invoiceNo: raw.invoiceNo.trim(),
      stockCode,
      description: raw.description.trim(),
      quantity,
      unitPrice,
      invoiceDate,
      customerId: normaliseCustomerId(raw.customerId),
      country: raw.country.trim() || UNSPECIFIED_COUNTRY,
      isReturn: quantity < 0,
    };
  }

  /** Returns a snapshot of current cleaning stats */
  getStats(): CleaningStats {
    return { ...this.stats };
  }

  resetStats(): void {
    this.stats = emptyStats();
  }

  private drop(
    reason: Exclude<keyof CleaningStats, 'total' | 'kept' | 'dropped' | 'unknownCustomer'>,
    rowNumber: number,
    detail: string,
  ): null {
    this.stats[reason]++;
    this.stats.dropped++;
    this.logger.warn(`Row ${rowNumber}: ${detail} — skipping`);
    return null;
  }
}

/** "13085.0" → "13085"; blanks and null markers → null */
export function normaliseCustomerId(value: string): string | null {
  const trimmed = value.trim();
  if (UNKNOWN_CUSTOMER_TOKENS.has(trimmed)) return null;

  const float = FLOAT_ID_REGEX.exec(trimmed);
  return float ? float[1] : trimmed;
}

function dedupKey(line: CleanTransactionLine): string {
  return JSON.stringify([
    line.invoiceNo,
    line.stockCode,
    line.description,
    line.quantity,
    line.unitPrice,
    line.invoiceDate.getTime(),
    line.customerId,
    line.country,
  ]);
}
