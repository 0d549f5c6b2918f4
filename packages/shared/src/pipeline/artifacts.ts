/**
 * Artifact Persistence
 *
 * Writes per-page markdown/JSON and a summary.json for auditing:
 *
 *   <outputDir>/summary.json            { inputs, fields }
 *   <outputDir>/<stem>[_pageNNN].json   raw engine payload per page
 *   <outputDir>/page_NNN.md             markdown text per page
 */

import fs from 'fs/promises';
import path from 'path';
import type { ContractOcrRun, MarkdownSegment, RunSummary } from '../types';
import { logger } from '../logger';
import { validateRunSummary } from '../schemas';

export interface WrittenArtifacts {
  summaryPath: string;
  jsonPaths: string[];
  markdownPaths: string[];
}

function pad3(n: number): string {
  return String(n).padStart(3, '0');
}

async function writeJsonFile(obj: unknown, destination: string): Promise<void> {
  await fs.mkdir(path.dirname(destination), { recursive: true });
  await fs.writeFile(destination, JSON.stringify(obj, null, 2), 'utf-8');
}

async function writeMarkdownFile(markdownText: string, destination: string): Promise<void> {
  await fs.mkdir(path.dirname(destination), { recursive: true });
  await fs.writeFile(destination, markdownText, 'utf-8');
}

/**
 * File stem for a raw payload: the input file name, else page_NNN,
 * with _pageNNN appended when the engine reports a page index.
 */
export function rawPayloadStem(payload: Record<string, unknown>, idx: number): string {
  const inputPath = payload.input_path;
  let stem =
    typeof inputPath === 'string' && inputPath.length > 0
      ? path.parse(inputPath).name
      : `page_${pad3(idx)}`;

  const pageIndex = payload.page_index;
  if (typeof pageIndex === 'number' && Number.isFinite(pageIndex)) {
    stem = `${stem}_page${pad3(Math.trunc(pageIndex))}`;
  }
  return stem;
}

/** Markdown text held by a payload, preferring non-empty `markdown_text` */
export function markdownPayloadText(payload: MarkdownSegment): string | null {
  if (typeof payload === 'string') return payload || null;
  if (typeof payload.markdown_text === 'string' && payload.markdown_text) return payload.markdown_text;
  if (typeof payload.markdown === 'string' && payload.markdown) return payload.markdown;
  return null;
}

export async function writeArtifacts(outputDir: string, run: ContractOcrRun): Promise<WrittenArtifacts> {
  await fs.mkdir(outputDir, { recursive: true });

  const summary: RunSummary = { inputs: run.inputs, fields: run.fields };
  const validation = validateRunSummary(summary);
  if (!validation.valid) {
    logger.warn('Run summary does not match schema', { errors: validation.errors });
  }

  const summaryPath = path.join(outputDir, 'summary.json');
  await writeJsonFile(summary, summaryPath);

  const jsonPaths: string[] = [];
  for (const [idx, payload] of run.raw.entries()) {
    const jsonPath = path.join(outputDir, `${rawPayloadStem(payload, idx)}.json`);
    await writeJsonFile(payload, jsonPath);
    jsonPaths.push(jsonPath);
  }

  const markdownPaths: string[] = [];
  for (const [idx, payload] of run.markdown.entries()) {
    const text = markdownPayloadText(payload);
    if (!text) continue;
    const mdPath = path.join(outputDir, `page_${pad3(idx)}.md`);
    await writeMarkdownFile(text, mdPath);
    markdownPaths.push(mdPath);
  }

  logger.info('Artifacts written', {
    output_dir: outputDir,
    json_files: jsonPaths.length,
    markdown_files: markdownPaths.length,
  });

  return { summaryPath, jsonPaths, markdownPaths };
}
