export {
  type OcrEngine,
  type OcrPageResult,
  extractMarkdownPayload,
  resultToRecord,
} from './ocr-engine';
export { SUPPORTED_SUFFIXES, isSupportedInput, resolveInputs } from './inputs';
export {
  type WrittenArtifacts,
  writeArtifacts,
  rawPayloadStem,
  markdownPayloadText,
} from './artifacts';
export { type RunContractOcrOptions, runContractOcr } from './run-contract-ocr';
