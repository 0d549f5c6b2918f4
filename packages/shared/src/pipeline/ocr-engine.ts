/**
 * OCR Engine Contract
 *
 * The pipeline treats the document-understanding engine as an opaque
 * collaborator that turns image/PDF files into per-page markdown.
 */

import type { MarkdownSegment } from '../types';
import { isMarkdownContainer } from '../extractors/contract/segments';

/**
 * One page (or one input) returned by an engine.
 * Engines may expose markdown directly or nested in their raw JSON payload.
 */
export interface OcrPageResult {
  inputPath?: string;
  pageIndex?: number;
  markdown?: MarkdownSegment;
  json?: Record<string, unknown>;
}

export interface OcrEngine {
  readonly name: string;
  predict(inputPaths: string[]): Promise<OcrPageResult[]>;
  close?(): Promise<void>;
}

function asMarkdownPayload(value: unknown): MarkdownSegment | null {
  if (typeof value === 'string') {
    return value.length > 0 ? value : null;
  }
  if (isMarkdownContainer(value)) {
    return Object.keys(value).length > 0 ? value : null;
  }
  return null;
}

/**
 * Markdown payload of a page result: `markdown` first, then `json.markdown`.
 */
export function extractMarkdownPayload(result: OcrPageResult): MarkdownSegment | null {
  return asMarkdownPayload(result.markdown) ?? asMarkdownPayload(result.json?.markdown);
}

/**
 * Raw JSON payload of a page result, annotated with its input path and page index.
 */
export function resultToRecord(result: OcrPageResult): Record<string, unknown> | null {
  if (!result.json) return null;

  const record: Record<string, unknown> = { ...result.json };
  if (record.input_path === undefined && result.inputPath !== undefined) {
    record.input_path = result.inputPath;
  }
  if (record.page_index === undefined && result.pageIndex !== undefined) {
    record.page_index = result.pageIndex;
  }
  return record;
}
