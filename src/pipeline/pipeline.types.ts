import { CleaningStats } from '../cleaning/cleaning.types';
import { WarehouseWriteResult } from '../warehouse/warehouse.types';

export interface PipelineReport {
  sourceFile: string;
  rowsRead: number;
  cleaning: CleaningStats;
  tables: WarehouseWriteResult;
  /** Σ net_amount over the loaded fact rows */
  netSales: number;
  /** Return lines as a percentage of all lines, 2 dp */
  returnRatePct: number;
  returnLines: number;
  exportedFiles: string[];
  /** Set when the load committed but the CSV export did not */
  exportError: string | null;
  durationMs: number;
}
