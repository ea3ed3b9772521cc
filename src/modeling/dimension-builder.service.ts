import { Injectable, Logger } from '@nestjs/common';
import { CleanTransactionLine } from '../cleaning/cleaning.types';
import { DimensionKeys, DimensionSet } from './modeling.types';
import {
  DimCountryRow,
  DimCustomerRow,
  DimDateRow,
  DimProductRow,
} from '../warehouse/warehouse.types';
import { isoWeekday, toIsoDate } from '../common/dates';
import { MONTH_NAMES, WEEKDAY_NAMES } from '../common/constants';

/** The unknown-customer row always takes the first customer key */
export const UNKNOWN_CUSTOMER_KEY = 1;

@Injectable()
export class DimensionBuilderService {
  private readonly logger = new Logger(DimensionBuilderService.name);

  /**
   * Derives the four dimensions from cleaned lines.
   * Natural keys are sorted before numbering so identical input always
   * yields identical surrogate keys.
   */
  build(lines: CleanTransactionLine[]): DimensionSet {
    const fullDates = new Set<string>();
    const productDescriptions = new Map<string, string>();
    const countryNames = new Set<string>();
    const customerCountries = new Map<string, string>();

    for (const line of lines) {
      fullDates.add(toIsoDate(line.invoiceDate));

      // First non-empty description wins
      const description = productDescriptions.get(line.stockCode);
      if (description === undefined || (description === '' && line.description !== '')) {
        productDescriptions.set(line.stockCode, line.description);
      }

      countryNames.add(line.country);

      if (line.customerId !== null && !customerCountries.has(line.customerId)) {
        customerCountries.set(line.customerId, line.country);
      }
    }

    const dates = this.buildDates(fullDates);
    const products = this.buildProducts(productDescriptions);
    const countries = this.buildCountries(countryNames);

    const keys: DimensionKeys = {
      date: new Map(dates.map((d) => [d.full_date, d.date_key])),
      product: new Map(products.map((p) => [p.stock_code, p.product_key])),
      country: new Map(countries.map((c) => [c.country, c.country_key])),
      customer: new Map(),
      unknownCustomer: UNKNOWN_CUSTOMER_KEY,
    };

    const customers = this.buildCustomers(customerCountries, keys.country);
    for (const customer of customers) {
      if (customer.customer_id !== null) {
        keys.customer.set(customer.customer_id, customer.customer_key);
      }
    }

    this.logger.log(
      `Dimensions built — dates: ${dates.length}, products: ${products.length}, ` +
        `countries: ${countries.length}, customers: ${customers.length}`,
    );

    return { dates, products, countries, customers, keys };
  }

  private buildDates(fullDates: Set<string>): DimDateRow[] {
    return sortedKeys(fullDates).map((fullDate, index) => {
      const date = new Date(`${fullDate}T00:00:00Z`);
      const month = date.getUTCMonth() + 1;
      const weekday = isoWeekday(date);

      return {
        date_key: index + 1,
        full_date: fullDate,
        year: date.getUTCFullYear(),
        month,
        day: date.getUTCDate(),
        weekday,
        weekday_name: WEEKDAY_NAMES[weekday - 1],
        month_name: MONTH_NAMES[month - 1],
        quarter: Math.floor((month - 1) / 3) + 1,
      };
    });
  }

  private buildProducts(descriptions: Map<string, string>): DimProductRow[] {
    return sortedKeys(descriptions).map((stockCode, index) => ({
      product_key: index + 1,
      stock_code: stockCode,
      description: descriptions.get(stockCode) ?? '',
    }));
  }

  private buildCountries(names: Set<string>): DimCountryRow[] {
    return sortedKeys(names).map((country, index) => ({
      country_key: index + 1,
      country,
    }));
  }

  private buildCustomers(
    countries: Map<string, string>,
    countryKeys: Map<string, number>,
  ): DimCustomerRow[] {
    const unknown: DimCustomerRow = {
      customer_key: UNKNOWN_CUSTOMER_KEY,
      customer_id: null,
      country_key: null,
      is_unknown: true,
    };

    const known = sortedKeys(countries).map((customerId, index): DimCustomerRow => {
      const country = countries.get(customerId);
      return {
        customer_key: UNKNOWN_CUSTOMER_KEY + index + 1,
        customer_id: customerId,
        country_key: country === undefined ? null : countryKeys.get(country) ?? null,
        is_unknown: false,
      };
    });

    return [unknown, ...known];
  }
}

/** Code-unit order, independent of the host locale */
function sortedKeys(collection: Map<string, unknown> | Set<string>): string[] {
  return [...collection.keys()].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}
