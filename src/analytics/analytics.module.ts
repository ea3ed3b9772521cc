import { Module } from '@nestjs/common';
import { AnalyticsService } from './analytics.service';
import { AnalyticsController } from './analytics.controller';
import { AnalyticsReadyGuard } from './analytics-ready.guard';

@Module({
  controllers: [AnalyticsController],
  providers: [AnalyticsService, AnalyticsReadyGuard],
  exports: [AnalyticsService],
})
export class AnalyticsModule {}
