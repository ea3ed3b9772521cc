import { Module } from '@nestjs/common';
import { EtlModule } from './etl.module';
import { AnalyticsModule } from './analytics/analytics.module';
import { HealthModule } from './health/health.module';
import { PipelineBootstrap } from './pipeline/pipeline.bootstrap';
import { AppController } from './app.controller';

@Module({
  imports: [EtlModule, AnalyticsModule, HealthModule],
  controllers: [AppController],
  providers: [PipelineBootstrap],
})
export class AppModule {}
