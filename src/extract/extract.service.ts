import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs';
import { parse } from 'csv-parse';
import { ColumnMapping, RawField, RawTransactionLine } from './extract.types';
import { MissingColumnError, SourceFileNotFoundError } from '../common/errors';

/** Accepted header spellings per field, compared after normalisation */
const COLUMN_ALIASES: Record<RawField, string[]> = {
  invoiceNo: ['invoice', 'invoiceno', 'invoice_no'],
  stockCode: ['stockcode', 'stock_code'],
  description: ['description'],
  quantity: ['quantity'],
  invoiceDate: ['invoicedate', 'invoice_date'],
  unitPrice: ['price', 'unitprice', 'unit_price'],
  customerId: ['customerid', 'customer_id'],
  country: ['country'],
};

@Injectable()
export class ExtractService {
  private readonly logger = new Logger(ExtractService.name);

  /** Reads every data row of the CSV at `filePath` */
  async read(filePath: string, encoding: BufferEncoding = 'latin1'): Promise<RawTransactionLine[]> {
    if (!fs.existsSync(filePath)) {
      throw new SourceFileNotFoundError(filePath);
    }

    this.logger.log(`Reading ${filePath} (${encoding})...`);

    const source = fs.createReadStream(filePath);
    const parser = source.pipe(
      parse({
        encoding,
        bom: true,
        skip_empty_lines: true,
        trim: true,
        relax_column_count: true,
      }),
    );

    const lines: RawTransactionLine[] = [];
    let mapping: ColumnMapping | null = null;

    try {
      for await (const record of parser) {
        if (!Array.isArray(record)) continue;
        const cells = record.map(String);

        if (!mapping) {
          mapping = this.resolveColumns(cells);
          continue;
        }

        lines.push(this.toRawLine(cells, mapping));
      }
    } finally {
      source.destroy();
    }

    if (!mapping) {
      this.logger.warn(`${filePath} is empty — no header row`);
    }

    this.logger.log(`Read ${lines.length.toLocaleString()} row(s)`);
    return lines;
  }

  /**
   * Maps header cells to logical fields. Matching ignores case, spaces,
   * and a leading BOM. Throws when a field has no column.
   */
  resolveColumns(header: string[]): ColumnMapping {
    const normalised = header.map(normaliseHeader);

    const indexOf = (field: RawField): number => {
      const index = normalised.findIndex((name) => COLUMN_ALIASES[field].includes(name));
      if (index === -1) {
        throw new MissingColumnError(field, header);
      }
      return index;
    };

    return {
      invoiceNo: indexOf('invoiceNo'),
      stockCode: indexOf('stockCode'),
      description: indexOf('description'),
      quantity: indexOf('quantity'),
      invoiceDate: indexOf('invoiceDate'),
      unitPrice: indexOf('unitPrice'),
      customerId: indexOf('customerId'),
      country: indexOf('country'),
    };
  }

  private toRawLine(cells: string[], mapping: ColumnMapping): RawTransactionLine {
    // Ragged rows leave trailing fields undefined
    const cell = (field: RawField) => cells[mapping[field]] ?? '';

    return {
      invoiceNo: cell('invoiceNo'),
      stockCode: cell('stockCode'),
      description: cell('description'),
      quantity: cell('quantity'),
      invoiceDate: cell('invoiceDate'),
      unitPrice: cell('unitPrice'),
      customerId: cell('customerId'),
      country: cell('country'),
    };
  }
}

function normaliseHeader(name: string): string {
  return name.replace(/^\uFEFF/, '').replace(/\s+/g, '').toLowerCase();
}
