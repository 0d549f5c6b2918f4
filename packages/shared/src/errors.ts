/**
 * Error Types
 *
 * Every error raised by the pipeline carries a stable `code` that the HTTP
 * layer copies into the ErrorEnvelope.
 */

export class ContractOcrError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Raised when a markdown segment is neither a string nor a container with
 * a `markdown_text` / `markdown` key. Aborts the whole extraction.
 */
export class UnsupportedSegmentTypeError extends ContractOcrError {
  readonly segmentType: string;

  constructor(segment: unknown) {
    const segmentType = describeType(segment);
    super('unsupported_segment_type', `Unsupported markdown segment type: ${segmentType}`);
    this.segmentType = segmentType;
  }
}

export class InputNotFoundError extends ContractOcrError {
  readonly inputPath: string;

  constructor(inputPath: string) {
    super('input_not_found', `Input path does not exist: ${inputPath}`);
    this.inputPath = inputPath;
  }
}

export class OcrEngineError extends ContractOcrError {
  constructor(message: string) {
    super('ocr_engine_error', message);
  }
}

export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export function isContractOcrError(error: unknown): error is ContractOcrError {
  return error instanceof ContractOcrError;
}
