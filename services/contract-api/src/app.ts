/**
 * Contract API
 *
 * POST /extract   - Extract contract fields from markdown segments
 * POST /contracts - Queue contract files for OCR + extraction
 */

import path from 'path';
import express, { Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  config,
  runWithContext,
  getCorrelationId,
  withDocumentId,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  backpressureRejectionsCounter,
  contractExtractor,
  isContractOcrError,
  validateExtractRequest,
  validateSubmitContractRequest,
  type ContractOcrJob,
  type ErrorEnvelope,
  type ExtractRequest,
  type ExtractResponse,
  type SubmitContractRequest,
} from '@contract-ocr/shared';

/**
 * Queue operations the API needs; backed by BullMQ in production.
 */
export interface ContractJobQueue {
  enqueue(job: ContractOcrJob): Promise<void>;
  backpressure(): Promise<{ shouldWarn: boolean; shouldReject: boolean; depth: number }>;
}

function errorEnvelope(code: string, message: string): ErrorEnvelope {
  return {
    error: {
      code,
      message,
      correlation_id: getCorrelationId(),
    },
  };
}

function isExtractRequest(body: unknown): body is ExtractRequest {
  return validateExtractRequest(body).valid;
}

function isSubmitContractRequest(body: unknown): body is SubmitContractRequest {
  return validateSubmitContractRequest(body).valid;
}

/**
 * Resolve a requested output directory under the configured output root.
 * Returns null when the directory would escape the root.
 */
export function resolveOutputDir(outputRoot: string, documentId: string, requested?: string): string | null {
  const root = path.resolve(outputRoot);
  const target = path.resolve(root, requested ?? documentId);
  const relative = path.relative(root, target);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    return null;
  }
  return target;
}

export function createApp(jobs: ContractJobQueue): express.Express {
  const app = express();

  app.use(express.json({ limit: '5mb' }));

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const correlationId = req.header('x-correlation-id') || ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const status = res.statusCode.toString();

      httpRequestDurationHistogram.observe({ method: req.method, path: req.path, status }, duration);
      httpRequestsCounter.inc({ method: req.method, path: req.path, status });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  app.get('/health', async (_req: Request, res: Response) => {
    try {
      const backpressure = await jobs.backpressure();
      res.json({
        status: 'healthy',
        service: 'contract-api',
        queue_depth: backpressure.depth,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        service: 'contract-api',
        error: error instanceof Error ? error.message : 'Unknown error',
        timestamp: new Date().toISOString(),
      });
    }
  });

  app.get('/metrics', async (_req: Request, res: Response) => {
    try {
      res.setHeader('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      logger.error('Metrics scrape failed', error);
      res.status(500).end();
    }
  });

  /**
   * POST /extract
   * Synchronous field extraction from markdown already produced by an OCR engine
   */
  app.post('/extract', (req: Request, res: Response) => {
    const body: unknown = req.body;

    if (!isExtractRequest(body)) {
      res.status(400).json(errorEnvelope('invalid_request', 'segments must be an array'));
      return;
    }

    try {
      const correlationId = getCorrelationId();
      const { result, missingFields } = contractExtractor.extract(body.segments, {
        document_id: correlationId,
      });

      const response: ExtractResponse = {
        correlation_id: correlationId,
        fields: { ...result.fields },
        sources: { ...result.sources },
        origins: { ...result.origins },
        missing_fields: missingFields,
      };
      res.json(response);
    } catch (error) {
      if (isContractOcrError(error)) {
        res.status(400).json(errorEnvelope(error.code, error.message));
        return;
      }
      logger.error('Extraction request failed', error);
      res.status(500).json(errorEnvelope('internal_error', 'Extraction failed'));
    }
  });

  /**
   * POST /contracts
   * Queue contract files for OCR; results are written under the output root
   */
  app.post('/contracts', async (req: Request, res: Response) => {
    const body: unknown = req.body;

    if (!isSubmitContractRequest(body)) {
      res
        .status(400)
        .json(errorEnvelope('invalid_request', 'inputs must be a non-empty array of paths'));
      return;
    }

    const documentId = `contract_${ulid()}`;
    const outputDir = resolveOutputDir(config.outputRoot, documentId, body.output_dir);
    if (!outputDir) {
      res.status(400).json(errorEnvelope('invalid_request', 'output_dir must stay inside the output root'));
      return;
    }

    try {
      const backpressure = await jobs.backpressure();

      if (backpressure.shouldReject) {
        backpressureRejectionsCounter.inc();
        logger.warn('Request rejected due to backpressure', { queue_depth: backpressure.depth });
        res
          .status(503)
          .json(errorEnvelope('service_unavailable', 'System is under heavy load. Please retry later.'));
        return;
      }

      if (backpressure.shouldWarn) {
        logger.warn('Queue depth approaching threshold', { queue_depth: backpressure.depth });
      }

      const correlationId = getCorrelationId();
      await jobs.enqueue({
        event_type: 'contract.submitted',
        correlation_id: correlationId,
        document_id: documentId,
        inputs: body.inputs,
        output_dir: outputDir,
        submitted_at: new Date().toISOString(),
      });

      withDocumentId(documentId, () => {
        logger.info('Contract queued for OCR', { input_count: body.inputs.length });
      });

      res.status(202).json({ correlation_id: correlationId, document_id: documentId });
    } catch (error) {
      logger.error('Failed to queue contract', error);
      res.status(500).json(errorEnvelope('internal_error', 'Failed to queue contract'));
    }
  });

  // Malformed JSON bodies and other unhandled errors
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    if (status >= 500) {
      logger.error('Unhandled request error', err);
    }
    res
      .status(status)
      .json(errorEnvelope(status >= 500 ? 'internal_error' : 'invalid_request', err.message));
  });

  return app;
}
