/**
 * contract_ocr job processing
 */

import {
  logger,
  runWithContextAsync,
  runContractOcr,
  jobsProcessedCounter,
  jobDurationHistogram,
  QUEUE_NAMES,
  type ContractOcrJob,
  type OcrEngine,
  type RunSummary,
} from '@contract-ocr/shared';

export async function processContractOcrJob(
  data: ContractOcrJob,
  engine: OcrEngine,
  attempt = 1
): Promise<RunSummary> {
  const { correlation_id, document_id, inputs, output_dir } = data;

  return runWithContextAsync({ correlationId: correlation_id, documentId: document_id }, async () => {
    const startTime = Date.now();

    logger.info('Processing contract_ocr', {
      document_id,
      input_count: inputs.length,
      attempt,
    });

    try {
      const run = await runContractOcr(inputs, engine, {
        outputDir: output_dir,
        docInfo: { document_id },
      });

      const duration = (Date.now() - startTime) / 1000;
      jobsProcessedCounter.inc({ queue: QUEUE_NAMES.CONTRACT_OCR, status: 'success' });
      jobDurationHistogram.observe({ queue: QUEUE_NAMES.CONTRACT_OCR, status: 'success' }, duration);

      logger.info('contract_ocr completed', {
        document_id,
        page_count: run.markdown.length,
        output_dir,
        duration_ms: Math.round(duration * 1000),
      });

      return { inputs: run.inputs, fields: run.fields };
    } catch (error) {
      const duration = (Date.now() - startTime) / 1000;
      jobsProcessedCounter.inc({ queue: QUEUE_NAMES.CONTRACT_OCR, status: 'failure' });
      jobDurationHistogram.observe({ queue: QUEUE_NAMES.CONTRACT_OCR, status: 'failure' }, duration);

      logger.error('contract_ocr failed', error, { document_id, attempt });
      throw error;
    }
  });
}
