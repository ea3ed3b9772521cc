import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { PipelineService } from '../pipeline/pipeline.service';
import { AnalyticsService } from '../analytics/analytics.service';

@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    private readonly pipelineService: PipelineService,
    private readonly analyticsService: AnalyticsService,
  ) {}

  @Get()
  @ApiOperation({ summary: 'Service health — last pipeline run and analytics readiness' })
  @ApiResponse({ status: 200, description: 'Returns current service state' })
  getHealth() {
    const report = this.pipelineService.lastReport;
    const failed = this.pipelineService.lastError !== null;
    const noData = this.pipelineService.isComplete && report?.tables.fact_sales === 0;

    return {
      status: failed ? 'error' : noData ? 'warning' : 'ok',
      ...(noData && !failed && { warning: 'The last run loaded no fact rows. Check CSV_PATH.' }),
      pipeline: {
        running: this.pipelineService.isRunning,
        complete: this.pipelineService.isComplete,
        linesLoaded: report?.tables.fact_sales ?? 0,
        rowsDropped: report?.cleaning.dropped ?? 0,
        lastError: this.pipelineService.lastError,
        lastErrorCode: this.pipelineService.lastErrorCode,
      },
      analytics: {
        ready: this.analyticsService.isReady,
        computing: this.analyticsService.isComputing,
      },
    };
  }
}
