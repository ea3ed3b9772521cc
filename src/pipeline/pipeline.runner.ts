import { INestApplicationContext, Logger } from '@nestjs/common';
import { PipelineService } from './pipeline.service';
import { PipelineReport } from './pipeline.types';

const logger = new Logger('PipelineRunner');

/**
 * Runs the pipeline once inside a context created for the run. The context,
 * and with it the warehouse handle, is closed whether the run succeeds or not.
 */
export async function runPipelineOnce(
  createContext: () => Promise<INestApplicationContext>,
): Promise<PipelineReport> {
  const app = await createContext();

  try {
    const report = await app.get(PipelineService).run();
    logger.log(`Warehouse ready: ${report.tables.fact_sales.toLocaleString()} fact rows`);
    for (const file of report.exportedFiles) {
      logger.log(`Exported: ${file}`);
    }
    return report;
  } finally {
    await app.close();
  }
}
