/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  getDocumentId,
  runWithContext,
  runWithContextAsync,
  withDocumentId,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config } from './config';

// Types
export * from './types';

// Errors
export {
  ContractOcrError,
  UnsupportedSegmentTypeError,
  InputNotFoundError,
  OcrEngineError,
  describeType,
  isContractOcrError,
} from './errors';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type ContractOcrJob,
  getRedisConnection,
  createQueue,
  createWorker,
  getQueueMetrics,
  checkBackpressure,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  queueDepthGauge,
  queueMetricsGauge,
  jobDurationHistogram,
  jobsProcessedCounter,
  extractionsCounter,
  fieldsResolvedCounter,
  extractionDurationHistogram,
  ocrRequestsCounter,
  ocrRequestDurationHistogram,
  backpressureRejectionsCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  reportQueueMetrics,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export {
  validateContractFields,
  validateRunSummary,
  validateExtractRequest,
  validateSubmitContractRequest,
  schemas,
  type ValidationResult,
} from './schemas';

// Contract field extraction
export {
  ContractExtractor,
  contractExtractor,
  type ContractExtractorResult,
  // Parser
  extractContractFields,
  extractContractFieldValues,
  extractFromPatterns,
  ALGORITHM_VERSION,
  // Result
  ExtractionResultBuilder,
  emptyContractFields,
  getMissingFields,
  type FieldProposal,
  // Segments
  normalizeMarkdownSegments,
  segmentText,
  isMarkdownContainer,
  isMarkdownSegment,
  // Tables
  parseTableRow,
  isDelimiterRow,
  isHeaderRow,
  scanKeyValueRow,
  scanHeaderDataRows,
  extractFromTables,
  // Patterns
  FIELD_PATTERNS,
  TABLE_HEADERS,
  ALL_TABLE_HEADERS,
  isKnownHeaderLabel,
  matchFieldPattern,
} from './extractors/contract';

// OCR pipeline
export * from './pipeline';
