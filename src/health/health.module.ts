import { Module } from '@nestjs/common';
import { HealthController } from './health.controller';
import { PipelineModule } from '../pipeline/pipeline.module';
import { AnalyticsModule } from '../analytics/analytics.module';

@Module({
  imports: [PipelineModule, AnalyticsModule],
  controllers: [HealthController],
})
export class HealthModule {}
