/**
 * Contract Field Extractor
 *
 * Algorithmic extraction of party names, contract amount and key dates from
 * OCR markdown. Wraps the pure parser with logging and metrics; fields that
 * could not be found are reported as warnings so they can be reviewed by hand.
 */

import { FIELD_KEYS, type ContractDocumentInfo, type ContractExtractionResult, type FieldKey } from '../../types';
import { logger } from '../../logger';
import {
  extractionDurationHistogram,
  extractionsCounter,
  fieldsResolvedCounter,
} from '../../metrics';
import { extractContractFields, ALGORITHM_VERSION } from './parser';
import { getMissingFields } from './result';

export interface ContractExtractorResult {
  result: ContractExtractionResult;
  missingFields: FieldKey[];
  warnings: string[];
  metadata: {
    algorithmVersion: string;
    segmentCount: number;
    durationMs: number;
  };
}

export class ContractExtractor {
  readonly description = 'Contract markdown - table scan with pattern fallback';

  extract(segments: readonly unknown[], docInfo: ContractDocumentInfo): ContractExtractorResult {
    const startTime = Date.now();

    logger.info('Starting contract field extraction', {
      document_id: docInfo.document_id,
      segment_count: segments.length,
      algorithm_version: ALGORITHM_VERSION,
    });

    let result: ContractExtractionResult;
    try {
      result = extractContractFields(segments);
    } catch (error) {
      extractionsCounter.inc({ status: 'error' });
      logger.error('Contract field extraction failed', error, {
        document_id: docInfo.document_id,
      });
      throw error;
    }

    const durationMs = Date.now() - startTime;
    extractionDurationHistogram.observe(durationMs / 1000);
    extractionsCounter.inc({ status: 'success' });

    for (const key of FIELD_KEYS) {
      fieldsResolvedCounter.inc({ field: key, origin: result.origins[key] ?? 'missing' });
    }

    const missingFields = getMissingFields(result);
    const warnings = missingFields.map((key) => `Field not found, needs manual review: ${key}`);

    if (missingFields.length > 0) {
      logger.warn('Contract fields missing after extraction', {
        document_id: docInfo.document_id,
        missing_fields: missingFields,
      });
    }

    logger.info('Contract field extraction complete', {
      document_id: docInfo.document_id,
      table_fields: FIELD_KEYS.filter((key) => result.origins[key] === 'table').length,
      pattern_fields: FIELD_KEYS.filter((key) => result.origins[key] === 'pattern').length,
      missing_fields: missingFields.length,
      duration_ms: durationMs,
    });

    return {
      result,
      missingFields,
      warnings,
      metadata: {
        algorithmVersion: ALGORITHM_VERSION,
        segmentCount: segments.length,
        durationMs,
      },
    };
  }
}

export const contractExtractor = new ContractExtractor();

export * from './patterns';
export * from './parser';
export * from './result';
export * from './segments';
export * from './table-scanner';
