import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import warehouseConfig from './config/warehouse.config';
import { DatabaseModule } from './database/database.module';
import { PipelineModule } from './pipeline/pipeline.module';

/** Everything a pipeline run needs, without the HTTP surface */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [warehouseConfig],
    }),
    DatabaseModule,
    PipelineModule,
  ],
  exports: [PipelineModule],
})
export class EtlModule {}
