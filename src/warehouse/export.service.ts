import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import * as fs from 'fs';
import * as path from 'path';
import { stringify } from 'csv-stringify/sync';
import { WAREHOUSE_ENTITIES } from './entities';

@Injectable()
export class ExportService {
  private readonly logger = new Logger(ExportService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly config: ConfigService,
  ) {}

  /**
   * Dumps every warehouse table to `<exportDir>/<table>.csv`, ordered by its
   * surrogate key. Returns the files written; an empty export dir disables it.
   */
  async exportAll(): Promise<string[]> {
    const exportDir = this.config.get<string>('warehouse.exportDir') ?? '';
    if (!exportDir) {
      this.logger.log('EXPORT_DIR is empty — skipping CSV export');
      return [];
    }

    const resolvedDir = path.resolve(exportDir);
    fs.mkdirSync(resolvedDir, { recursive: true });

    const written: string[] = [];
    for (const entity of WAREHOUSE_ENTITIES) {
      const metadata = this.dataSource.getMetadata(entity);
      const columns = metadata.columns.map((c) => c.databaseName);
      const orderBy = metadata.primaryColumns.map((c) => `"${c.databaseName}"`).join(', ');

      const rows: Record<string, unknown>[] = await this.dataSource.query(
        `SELECT ${columns.map((c) => `"${c}"`).join(', ')} FROM "${metadata.tableName}" ORDER BY ${orderBy}`,
      );

      const outPath = path.join(resolvedDir, `${metadata.tableName}.csv`);
      fs.writeFileSync(outPath, stringify(rows, { header: true, columns }));
      written.push(outPath);
      this.logger.log(`Exported ${metadata.tableName} (${rows.length.toLocaleString()} rows) → ${outPath}`);
    }

    return written;
  }
}
