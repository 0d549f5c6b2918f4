/**
 * Contract Markdown Parser
 *
 * Two passes over OCR markdown:
 * 1. Table scan, block by block (tables tend to be the most structured source)
 * 2. Pattern fallback over all blocks joined with newlines, for fields still unset
 *
 * Pure and synchronous; every call starts from an empty result.
 */

import type { ContractExtractionResult, ContractFields } from '../../types';
import { matchFieldPattern } from './patterns';
import { ExtractionResultBuilder } from './result';
import { normalizeMarkdownSegments } from './segments';
import { extractFromTables } from './table-scanner';

/**
 * Algorithm version for tracking
 */
export const ALGORITHM_VERSION = '1.0.0';

/**
 * Fill pending fields from the combined text using the ordered field patterns.
 */
export function extractFromPatterns(combinedText: string, result: ExtractionResultBuilder): void {
  for (const key of result.pendingKeys()) {
    const proposal = matchFieldPattern(combinedText, key);
    if (proposal) {
      result.propose(proposal, 'pattern');
    }
  }
}

/**
 * Extract contract fields from markdown segments.
 *
 * @throws UnsupportedSegmentTypeError when a segment is not a string or markdown container
 */
export function extractContractFields(segments: readonly unknown[]): ContractExtractionResult {
  const texts = normalizeMarkdownSegments(segments);
  const result = new ExtractionResultBuilder();

  for (const text of texts) {
    extractFromTables(text, result);
  }

  extractFromPatterns(texts.join('\n'), result);

  return result.build();
}

/**
 * Flat field mapping with null for fields that were not found.
 */
export function extractContractFieldValues(segments: readonly unknown[]): ContractFields {
  return { ...extractContractFields(segments).fields };
}
