/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

export interface Config {
  // Runtime
  nodeEnv: string;
  logLevel: string;

  // Redis
  redisHost: string;
  redisPort: number;
  redisUrl: string;

  // Queue & Worker
  workerConcurrency: number;
  maxJobAttempts: number;
  backoffBaseMs: number;
  workerMetricsPort: number;

  // Backpressure Controls
  maxQueueDepthWarning: number;
  maxQueueDepthReject: number;

  // HTTP
  apiPort: number;

  // Artifacts
  outputRoot: string;

  // OCR
  ocrModel: string;
  ocrRequestTimeoutMs: number;
  openaiApiKey: string;
}

export const config: Config = {
  // Runtime
  nodeEnv: process.env.NODE_ENV || 'development',
  logLevel: process.env.LOG_LEVEL || 'info',

  // Redis
  redisHost: process.env.REDIS_HOST || 'redis',
  redisPort: parseInt(process.env.REDIS_PORT || '6379', 10),
  redisUrl: process.env.REDIS_URL || 'redis://redis:6379',

  // Queue & Worker
  workerConcurrency: parseInt(process.env.WORKER_CONCURRENCY || '2', 10),
  maxJobAttempts: parseInt(process.env.BULLMQ_DEFAULT_ATTEMPTS || '3', 10),
  backoffBaseMs: parseInt(process.env.BACKOFF_BASE_MS || '2000', 10),
  workerMetricsPort: parseInt(process.env.WORKER_METRICS_PORT || '9464', 10),

  // Backpressure Controls
  maxQueueDepthWarning: parseInt(process.env.MAX_QUEUE_DEPTH_WARNING || '500', 10),
  maxQueueDepthReject: parseInt(process.env.MAX_QUEUE_DEPTH_REJECT || '1000', 10),

  // HTTP
  apiPort: parseInt(process.env.PORT || '8080', 10),

  // Artifacts
  outputRoot: process.env.OUTPUT_ROOT || '/var/lib/contract-ocr/outputs',

  // OCR
  ocrModel: process.env.OCR_MODEL || 'gpt-4o',
  ocrRequestTimeoutMs: parseInt(process.env.OCR_REQUEST_TIMEOUT_MS || '120000', 10),
  openaiApiKey: process.env.OPENAI_API_KEY || '',
};
