#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { EtlModule } from './etl.module';
import { runPipelineOnce } from './pipeline/pipeline.runner';
import { errorMessage } from './common/errors';

const logger = new Logger('EtlCli');

runPipelineOnce(() => NestFactory.createApplicationContext(EtlModule)).catch((err) => {
  logger.error(`ETL run failed: ${errorMessage(err)}`);
  process.exitCode = 1;
});
