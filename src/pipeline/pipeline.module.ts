import { Module } from '@nestjs/common';
import { PipelineService } from './pipeline.service';
import { ExtractService } from '../extract/extract.service';
import { CleaningService } from '../cleaning/cleaning.service';
import { DimensionBuilderService } from '../modeling/dimension-builder.service';
import { FactBuilderService } from '../modeling/fact-builder.service';
import { WarehouseModule } from '../warehouse/warehouse.module';
import { AnalyticsModule } from '../analytics/analytics.module';

@Module({
  imports: [WarehouseModule, AnalyticsModule],
  providers: [
    PipelineService,
    ExtractService,
    CleaningService,
    DimensionBuilderService,
    FactBuilderService,
  ],
  exports: [PipelineService],
})
export class PipelineModule {}
