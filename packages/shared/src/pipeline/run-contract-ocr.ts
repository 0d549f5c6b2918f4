/**
 * Contract OCR Pipeline
 *
 * 1. Resolve input files (images or PDFs)
 * 2. Run the OCR engine to get per-page markdown and raw payloads
 * 3. Extract contract fields from the markdown
 * 4. Optionally persist markdown/JSON artifacts and summary.json
 */

import type { ContractDocumentInfo, ContractOcrRun, MarkdownSegment } from '../types';
import { logger } from '../logger';
import { contractExtractor, type ContractExtractor } from '../extractors/contract';
import { extractMarkdownPayload, resultToRecord, type OcrEngine } from './ocr-engine';
import { resolveInputs } from './inputs';
import { writeArtifacts } from './artifacts';

export interface RunContractOcrOptions {
  /** When set, artifacts are written under this directory */
  outputDir?: string;
  docInfo?: ContractDocumentInfo;
  extractor?: ContractExtractor;
}

export async function runContractOcr(
  inputs: string | readonly string[],
  engine: OcrEngine,
  options: RunContractOcrOptions = {}
): Promise<ContractOcrRun> {
  const inputPaths = await resolveInputs(inputs);
  const docInfo = options.docInfo ?? { document_id: inputPaths[0] ?? 'empty' };
  const extractor = options.extractor ?? contractExtractor;

  logger.info('Running OCR engine', {
    engine: engine.name,
    document_id: docInfo.document_id,
    file_count: inputPaths.length,
  });

  const markdown: MarkdownSegment[] = [];
  const raw: Record<string, unknown>[] = [];

  try {
    const pages = await engine.predict(inputPaths);
    for (const page of pages) {
      const payload = extractMarkdownPayload(page);
      if (payload) {
        markdown.push(payload);
      }
      const record = resultToRecord(page);
      if (record) {
        raw.push(record);
      }
    }
  } finally {
    if (engine.close) {
      await engine.close();
    }
  }

  if (markdown.length === 0) {
    logger.warn('No markdown payloads were produced by the OCR engine', {
      engine: engine.name,
      document_id: docInfo.document_id,
    });
  }

  const { result } = extractor.extract(markdown, docInfo);

  const run: ContractOcrRun = {
    inputs: inputPaths,
    fields: { ...result.fields },
    markdown,
    raw,
  };

  if (options.outputDir) {
    await writeArtifacts(options.outputDir, run);
  }

  return run;
}
