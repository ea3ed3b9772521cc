import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as path from 'path';
import { ExtractService } from '../extract/extract.service';
import { CleaningService } from '../cleaning/cleaning.service';
import { DimensionBuilderService } from '../modeling/dimension-builder.service';
import { FactBuilderService } from '../modeling/fact-builder.service';
import { WarehouseWriterService } from '../warehouse/warehouse-writer.service';
import { ExportService } from '../warehouse/export.service';
import { AnalyticsService } from '../analytics/analytics.service';
import { PipelineReport } from './pipeline.types';
import { PipelineBusyError, errorCode, errorMessage } from '../common/errors';

@Injectable()
export class PipelineService {
  private readonly logger = new Logger(PipelineService.name);

  isRunning = false;
  isComplete = false;
  lastReport: PipelineReport | null = null;
  lastError: string | null = null;
  lastErrorCode: string | null = null;

  constructor(
    private readonly config: ConfigService,
    private readonly extractService: ExtractService,
    private readonly cleaningService: CleaningService,
    private readonly dimensionBuilder: DimensionBuilderService,
    private readonly factBuilder: FactBuilderService,
    private readonly warehouseWriter: WarehouseWriterService,
    private readonly exportService: ExportService,
    private readonly analyticsService: AnalyticsService,
  ) {}

  /**
   * Extract → clean → dimensions → facts → write → export → metrics.
   * Any fatal error aborts before or inside the warehouse transaction, so
   * the previous warehouse survives a failed run.
   */
  async run(): Promise<PipelineReport> {
    if (this.isRunning) {
      throw new PipelineBusyError();
    }

    this.isRunning = true;
    this.lastError = null;
    this.lastErrorCode = null;
    const start = Date.now();

    try {
      const sourceFile = path.resolve(
        this.config.get<string>('warehouse.csvPath') ?? './data/online_retail_II.csv',
      );
      const encoding = this.config.get<BufferEncoding>('warehouse.csvEncoding') ?? 'latin1';

      const raw = await this.extractService.read(sourceFile, encoding);
      const { lines, stats } = this.cleaningService.clean(raw);
      const dimensions = this.dimensionBuilder.build(lines);
      const facts = this.factBuilder.build(lines, dimensions);
      const totals = this.factBuilder.totals(lines);

      const tables = await this.warehouseWriter.write({
        dates: dimensions.dates,
        products: dimensions.products,
        countries: dimensions.countries,
        customers: dimensions.customers,
        facts,
      });

      // Sanity check: fact count and the return / sale split
      this.logger.log(
        `fact_sales rows: ${tables.fact_sales.toLocaleString()} ` +
          `(returns: ${totals.returnCount.toLocaleString()}, ` +
          `sales: ${(totals.lineCount - totals.returnCount).toLocaleString()})`,
      );

      let exportedFiles: string[] = [];
      let exportError: string | null = null;
      try {
        exportedFiles = await this.exportService.exportAll();
      } catch (err) {
        // The load is already committed; a failed dump only costs the flat files
        exportError = errorMessage(err);
        this.logger.error(`CSV export failed: ${exportError}`);
      }

      await this.analyticsService.precompute();

      const report: PipelineReport = {
        sourceFile,
        rowsRead: raw.length,
        cleaning: stats,
        tables,
        netSales: totals.netSales,
        returnRatePct: totals.returnRatePct,
        returnLines: totals.returnCount,
        exportedFiles,
        exportError,
        durationMs: Date.now() - start,
      };

      this.lastReport = report;
      this.isComplete = true;

      this.logger.log(
        `Pipeline complete in ${report.durationMs}ms — rows read: ${report.rowsRead.toLocaleString()}, ` +
          `loaded: ${tables.fact_sales.toLocaleString()}, dropped: ${stats.dropped}` +
          ` | missingFields=${stats.missingFields}, invalidQuantity=${stats.invalidQuantity}` +
          `, zeroQuantity=${stats.zeroQuantity}, invalidPrice=${stats.invalidPrice}` +
          `, nonPositivePrice=${stats.nonPositivePrice}, invalidDate=${stats.invalidDate}` +
          `, duplicates=${stats.duplicates} | net sales: ${report.netSales}, return rate: ${report.returnRatePct}%`,
      );

      if (tables.fact_sales === 0) {
        this.logger.warn('No fact rows were loaded. Check CSV_PATH and the source file contents.');
      }

      return report;
    } catch (err) {
      this.lastError = errorMessage(err);
      this.lastErrorCode = errorCode(err);
      this.logger.error(`Pipeline failed [${this.lastErrorCode ?? 'UNEXPECTED'}]: ${this.lastError}`);
      throw err;
    } finally {
      this.isRunning = false;
    }
  }
}
