import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PipelineService } from './pipeline.service';
import { errorMessage } from '../common/errors';

/** Loads the warehouse in the background once the HTTP app is up */
@Injectable()
export class PipelineBootstrap implements OnApplicationBootstrap {
  private readonly logger = new Logger(PipelineBootstrap.name);

  constructor(
    private readonly config: ConfigService,
    private readonly pipelineService: PipelineService,
  ) {}

  onApplicationBootstrap() {
    if (!this.config.get<boolean>('warehouse.runOnBoot')) {
      this.logger.log('RUN_ON_BOOT is false — serving the existing warehouse');
      return;
    }

    this.pipelineService
      .run()
      .catch((err) => this.logger.error(`Load on boot failed: ${errorMessage(err)}`));
  }
}
