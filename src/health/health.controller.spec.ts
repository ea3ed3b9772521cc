import { Test } from '@nestjs/testing';
import { HealthController } from './health.controller';
import { PipelineService } from '../pipeline/pipeline.service';
import { AnalyticsService } from '../analytics/analytics.service';
import { PipelineReport } from '../pipeline/pipeline.types';

const report = (factRows: number, dropped: number): PipelineReport => ({
  sourceFile: '/data/online_retail_II.csv',
  rowsRead: factRows + dropped,
  cleaning: {
    total: factRows + dropped,
    kept: factRows,
    dropped,
    missingFields: dropped,
    invalidQuantity: 0,
    zeroQuantity: 0,
    invalidPrice: 0,
    nonPositivePrice: 0,
    invalidDate: 0,
    duplicates: 0,
    unknownCustomer: 0,
  },
  tables: { dim_date: 1, dim_product: 1, dim_country: 1, dim_customer: 1, fact_sales: factRows },
  netSales: 0,
  returnRatePct: 0,
  returnLines: 0,
  exportedFiles: [],
  exportError: null,
  durationMs: 5,
});

interface PipelineState {
  isRunning: boolean;
  isComplete: boolean;
  lastReport: PipelineReport | null;
  lastError: string | null;
  lastErrorCode: string | null;
}

describe('HealthController', () => {
  const makeController = async (pipeline: PipelineState, analytics: { isReady: boolean; isComputing: boolean }) => {
    const moduleRef = await Test.createTestingModule({
      controllers: [HealthController],
      providers: [
        { provide: PipelineService, useValue: pipeline },
        { provide: AnalyticsService, useValue: analytics },
      ],
    }).compile();
    return moduleRef.get(HealthController);
  };

  it('reflects a load in progress', async () => {
    const ctrl = await makeController(
      { isRunning: true, isComplete: false, lastReport: null, lastError: null, lastErrorCode: null },
      { isReady: false, isComputing: false },
    );

    expect(ctrl.getHealth()).toEqual({
      status: 'ok',
      pipeline: { running: true, complete: false, linesLoaded: 0, rowsDropped: 0, lastError: null, lastErrorCode: null },
      analytics: { ready: false, computing: false },
    });
  });

  it('reports the last completed run', async () => {
    const ctrl = await makeController(
      { isRunning: false, isComplete: true, lastReport: report(1033036, 34422), lastError: null, lastErrorCode: null },
      { isReady: true, isComputing: false },
    );

    const result = ctrl.getHealth();
    expect(result.status).toBe('ok');
    expect(result.pipeline.linesLoaded).toBe(1033036);
    expect(result.pipeline.rowsDropped).toBe(34422);
    expect(result.analytics.ready).toBe(true);
  });

  it('warns when the last run loaded nothing', async () => {
    const ctrl = await makeController(
      { isRunning: false, isComplete: true, lastReport: report(0, 4), lastError: null, lastErrorCode: null },
      { isReady: true, isComputing: false },
    );

    const result = ctrl.getHealth();
    expect(result.status).toBe('warning');
    expect(result.warning).toBe('The last run loaded no fact rows. Check CSV_PATH.');
  });

  it('reports an error after a failed run', async () => {
    const ctrl = await makeController(
      {
        isRunning: false,
        isComplete: false,
        lastReport: null,
        lastError: 'Source file not found: /data/missing.csv',
        lastErrorCode: 'SOURCE_FILE_NOT_FOUND',
      },
      { isReady: false, isComputing: false },
    );

    const result = ctrl.getHealth();
    expect(result.status).toBe('error');
    expect(result.warning).toBeUndefined();
    expect(result.pipeline.lastError).toBe('Source file not found: /data/missing.csv');
    expect(result.pipeline.lastErrorCode).toBe('SOURCE_FILE_NOT_FOUND');
  });
});
