/**
 * Shared TypeScript Types
 *
 * Types for the contract OCR extraction pipeline, matching JSON schemas in docs/contracts/
 */

// ============================================================================
// Contract Fields
// ============================================================================

export const FIELD_KEYS = [
  'party_a',
  'party_b',
  'contract_amount',
  'sign_date',
  'effective_date',
  'termination_date',
] as const;

export type FieldKey = (typeof FIELD_KEYS)[number];

/** Flat output contract: `null` marks a field that was not found. */
export type ContractFields = Record<FieldKey, string | null>;

/** Which pass of the extractor resolved a field. */
export type FieldOrigin = 'table' | 'pattern';

// ============================================================================
// Markdown Segments
// ============================================================================

/**
 * Container shape returned by document-understanding engines.
 * `markdown_text` is preferred over `markdown` when both are present.
 */
export interface MarkdownContainer {
  markdown_text?: unknown;
  markdown?: unknown;
  [key: string]: unknown;
}

export type MarkdownSegment = string | MarkdownContainer;

// ============================================================================
// Extraction Output
// ============================================================================

export interface ContractExtractionResult {
  readonly fields: Readonly<ContractFields>;
  /** Raw table line or full pattern match that produced each field */
  readonly sources: Readonly<Partial<Record<FieldKey, string>>>;
  readonly origins: Readonly<Partial<Record<FieldKey, FieldOrigin>>>;
}

export interface ContractDocumentInfo {
  document_id: string;
  source_filename?: string;
}

// ============================================================================
// Pipeline
// ============================================================================

export interface ContractOcrRun {
  inputs: string[];
  fields: ContractFields;
  markdown: MarkdownSegment[];
  raw: Record<string, unknown>[];
}

export interface RunSummary {
  inputs: string[];
  fields: ContractFields;
}

// ============================================================================
// API
// ============================================================================

export interface ExtractRequest {
  /** Each item is checked by the segment normalizer */
  segments: unknown[];
}

export interface ExtractResponse {
  correlation_id: string;
  fields: ContractFields;
  sources: Partial<Record<FieldKey, string>>;
  origins: Partial<Record<FieldKey, FieldOrigin>>;
  missing_fields: FieldKey[];
}

export interface SubmitContractRequest {
  inputs: string[];
  output_dir?: string;
}

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
