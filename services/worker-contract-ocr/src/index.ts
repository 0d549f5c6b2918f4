/**
 * Contract OCR Worker
 *
 * Consumes contract_ocr jobs: runs the OCR engine over the submitted files,
 * extracts contract fields and writes artifacts to the job's output directory.
 */

import { Job } from 'bullmq';
import {
  logger,
  config,
  createWorker,
  serveMetrics,
  QUEUE_NAMES,
  type ContractOcrJob,
  type RunSummary,
} from '@contract-ocr/shared';
import { OpenAiVisionOcrEngine } from './lib/ocr';
import { processContractOcrJob } from './lib/process-job';

const engine = new OpenAiVisionOcrEngine();

const worker = createWorker<ContractOcrJob, RunSummary>(
  QUEUE_NAMES.CONTRACT_OCR,
  (job: Job<ContractOcrJob, RunSummary>) => processContractOcrJob(job.data, engine, job.attemptsMade + 1)
);

const metricsServer = serveMetrics(config.workerMetricsPort);

logger.info('Contract OCR worker started', { engine: engine.name, model: config.ocrModel });

async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  metricsServer.close();
  await worker.close();
  process.exit(0);
}

function onSignal(signal: string): void {
  shutdown(signal).catch((error: unknown) => {
    logger.error('Shutdown failed', error);
    process.exit(1);
  });
}

process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));
