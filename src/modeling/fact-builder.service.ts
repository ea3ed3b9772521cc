import { Injectable, Logger } from '@nestjs/common';
import { CleanTransactionLine } from '../cleaning/cleaning.types';
import { DimensionName, DimensionSet, SalesTotals } from './modeling.types';
import { FactSalesRow } from '../warehouse/warehouse.types';
import { DimensionLookupError } from '../common/errors';
import { roundTo, toDecimal } from '../common/money';
import { toIsoDate, toIsoDateTime } from '../common/dates';

@Injectable()
export class FactBuilderService {
  private readonly logger = new Logger(FactBuilderService.name);

  /**
   * Emits one fact row per clean line, keyed into the given dimensions.
   * A missing dimension member means the dimensions were built from other
   * data: throws DimensionLookupError and returns nothing.
   */
  build(lines: CleanTransactionLine[], dimensions: DimensionSet): FactSalesRow[] {
    const { keys } = dimensions;

    const facts = lines.map((line, index): FactSalesRow => {
      const lineNumber = index + 1;
      const lookup = (dimension: DimensionName, map: Map<string, number>, key: string): number => {
        const surrogate = map.get(key);
        if (surrogate === undefined) {
          throw new DimensionLookupError(dimension, key, lineNumber);
        }
        return surrogate;
      };

      const customerKey =
        line.customerId === null
          ? keys.unknownCustomer
          : lookup('dim_customer', keys.customer, line.customerId);

      return {
        sales_key: lineNumber,
        date_key: lookup('dim_date', keys.date, toIsoDate(line.invoiceDate)),
        product_key: lookup('dim_product', keys.product, line.stockCode),
        customer_key: customerKey,
        country_key: lookup('dim_country', keys.country, line.country),
        invoice_no: line.invoiceNo,
        invoice_datetime: toIsoDateTime(line.invoiceDate),
        quantity: line.quantity,
        unit_price: toDecimal(line.unitPrice),
        net_amount: toDecimal(line.quantity * line.unitPrice),
        is_return: line.isReturn,
      };
    });

    this.logger.log(`Fact table built — ${facts.length.toLocaleString()} line(s)`);
    return facts;
  }

  /** Net sales and return rate over the clean lines, computed in fixed point */
  totals(lines: CleanTransactionLine[]): SalesTotals {
    let net = 0;
    let returnCount = 0;

    for (const line of lines) {
      net += line.quantity * line.unitPrice;
      if (line.isReturn) returnCount++;
    }

    return {
      lineCount: lines.length,
      returnCount,
      netSales: toDecimal(net),
      returnRatePct: lines.length === 0 ? 0 : roundTo((returnCount / lines.length) * 100, 2),
    };
  }
}
