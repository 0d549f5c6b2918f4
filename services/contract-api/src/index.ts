/**
 * Contract API entry point
 */

import {
  logger,
  config,
  createQueue,
  checkBackpressure,
  reportQueueMetrics,
  QUEUE_NAMES,
  type ContractOcrJob,
} from '@contract-ocr/shared';
import { createApp, type ContractJobQueue } from './app';

const contractOcrQueue = createQueue<ContractOcrJob, void>(QUEUE_NAMES.CONTRACT_OCR);

const jobs: ContractJobQueue = {
  async enqueue(job) {
    await contractOcrQueue.add('contract_ocr', job, { jobId: job.document_id });
  },
  async backpressure() {
    await reportQueueMetrics([{ name: QUEUE_NAMES.CONTRACT_OCR, queue: contractOcrQueue }]);
    return checkBackpressure(contractOcrQueue);
  },
};

const app = createApp(jobs);

const server = app.listen(config.apiPort, () => {
  logger.info('Contract API started', { port: config.apiPort });
});

async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  server.close();
  await contractOcrQueue.close();
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
