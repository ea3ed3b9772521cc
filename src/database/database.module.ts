import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { WAREHOUSE_ENTITIES } from '../warehouse/entities';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (config: ConfigService): TypeOrmModuleOptions => ({
        type: 'better-sqlite3',
        database: config.get<string>('warehouse.databasePath') ?? './online_retail.db',
        entities: WAREHOUSE_ENTITIES,
        // WarehouseWriterService drops and recreates every table on each load
        synchronize: false,
      }),
    }),
  ],
})
export class DatabaseModule {}
