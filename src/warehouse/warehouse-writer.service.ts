import { Injectable, Logger } from '@nestjs/common';
import {
  DataSource,
  EntityManager,
  EntityTarget,
  ObjectLiteral,
  Table,
  TableForeignKey,
} from 'typeorm';
import {
  DimCountryEntity,
  DimCustomerEntity,
  DimDateEntity,
  DimProductEntity,
  FactSalesEntity,
  WAREHOUSE_ENTITIES,
} from './entities';
import { WarehouseTables, WarehouseWriteResult } from './warehouse.types';
import { WarehouseWriteError } from '../common/errors';
import { BATCH_SIZE } from '../common/constants';

@Injectable()
export class WarehouseWriterService {
  private readonly logger = new Logger(WarehouseWriterService.name);

  constructor(private readonly dataSource: DataSource) {}

  /**
   * Drops and recreates the five tables, then loads `tables`, all in a single
   * transaction. On any failure the transaction rolls back, the previous
   * tables stay in place, and a WarehouseWriteError is thrown.
   */
  async write(tables: WarehouseTables): Promise<WarehouseWriteResult> {
    const start = Date.now();
    this.logger.log('Writing warehouse tables...');

    try {
      const result = await this.dataSource.transaction((manager) => this.replaceAll(manager, tables));
      this.logger.log(
        `Warehouse written in ${Date.now() - start}ms — ` +
          Object.entries(result)
            .map(([table, count]) => `${table}=${count.toLocaleString()}`)
            .join(', '),
      );
      return result;
    } catch (err) {
      const error = new WarehouseWriteError(err);
      this.logger.error(error.message);
      throw error;
    }
  }

  private async replaceAll(
    manager: EntityManager,
    tables: WarehouseTables,
  ): Promise<WarehouseWriteResult> {
    await this.rebuildSchema(manager);

    // Parents before children
    return {
      dim_date: await this.insert(manager, DimDateEntity, tables.dates),
      dim_product: await this.insert(manager, DimProductEntity, tables.products),
      dim_country: await this.insert(manager, DimCountryEntity, tables.countries),
      dim_customer: await this.insert(manager, DimCustomerEntity, tables.customers),
      fact_sales: await this.insert(manager, FactSalesEntity, tables.facts),
    };
  }

  /**
   * Whatever schema the file holds (an older layout included) is replaced by
   * the one the entities describe. SQLite DDL is transactional, so a rollback
   * restores the old tables too.
   */
  private async rebuildSchema(manager: EntityManager): Promise<void> {
    const queryRunner = manager.queryRunner;
    if (!queryRunner) {
      throw new Error('Schema rebuild must run inside a transaction');
    }

    const { driver } = manager.connection;
    const metadatas = WAREHOUSE_ENTITIES.map((entity) => manager.connection.getMetadata(entity));

    // Children before parents on drop
    for (const metadata of [...metadatas].reverse()) {
      await queryRunner.query(`DROP TABLE IF EXISTS "${metadata.tableName}"`);
    }

    for (const metadata of metadatas) {
      const table = Table.create(metadata, driver);
      for (const foreignKey of metadata.foreignKeys) {
        table.addForeignKey(TableForeignKey.create(foreignKey, driver));
      }
      await queryRunner.createTable(table, false, true, true);
    }
  }

  private async insert<T extends ObjectLiteral>(
    manager: EntityManager,
    entity: EntityTarget<T>,
    rows: T[],
  ): Promise<number> {
    for (let i = 0; i < rows.length; i += BATCH_SIZE) {
      await manager
        .createQueryBuilder()
        .insert()
        .into(entity)
        .values(rows.slice(i, i + BATCH_SIZE))
        .execute();
    }
    return rows.length;
  }
}
