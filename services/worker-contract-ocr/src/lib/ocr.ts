/**
 * OpenAI Vision OCR Engine
 *
 * Sends each contract image or PDF to a vision model and asks for a
 * faithful Markdown transcription, with tables rendered as pipe tables so
 * the field extractor's table scan can use them.
 */

import fs from 'fs/promises';
import path from 'path';
import OpenAI from 'openai';
import {
  logger,
  config,
  ocrRequestsCounter,
  ocrRequestDurationHistogram,
  OcrEngineError,
  type OcrEngine,
  type OcrPageResult,
} from '@contract-ocr/shared';

const PROMPT_VERSION = '1.0.0';

const OCR_SYSTEM_PROMPT = `You transcribe scanned contracts into Markdown.
- Reproduce the text exactly as printed, in its original language (Chinese or English).
- Render every table as a Markdown pipe table, one row per line.
- Keep labels and their values on the same line, e.g. "甲方：北京星河科技有限公司" or "Party A: Aurora Analytics LLC".
- Do not summarise, translate or add commentary. Output Markdown only.`;

const IMAGE_MIME_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
};

type ContentPart = OpenAI.Chat.Completions.ChatCompletionContentPart;

async function buildContentPart(filePath: string): Promise<ContentPart> {
  const ext = path.extname(filePath).toLowerCase();
  const data = await fs.readFile(filePath);
  const base64 = data.toString('base64');

  if (ext === '.pdf') {
    return {
      type: 'file',
      file: {
        filename: path.basename(filePath),
        file_data: `data:application/pdf;base64,${base64}`,
      },
    };
  }

  const mimeType = IMAGE_MIME_TYPES[ext];
  if (!mimeType) {
    throw new OcrEngineError(`Unsupported input for vision OCR, convert to PNG/JPEG/PDF first: ${filePath}`);
  }

  return {
    type: 'image_url',
    image_url: { url: `data:${mimeType};base64,${base64}`, detail: 'high' },
  };
}

export class OpenAiVisionOcrEngine implements OcrEngine {
  readonly name = 'openai-vision';

  private readonly client: OpenAI;
  private readonly model: string;

  constructor(options: { apiKey?: string; model?: string; timeoutMs?: number } = {}) {
    this.client = new OpenAI({
      apiKey: options.apiKey || config.openaiApiKey,
      timeout: options.timeoutMs ?? config.ocrRequestTimeoutMs,
    });
    this.model = options.model || config.ocrModel;
  }

  async predict(inputPaths: string[]): Promise<OcrPageResult[]> {
    const pages: OcrPageResult[] = [];
    for (const inputPath of inputPaths) {
      pages.push(await this.transcribe(inputPath));
    }
    return pages;
  }

  private async transcribe(inputPath: string): Promise<OcrPageResult> {
    const content = await buildContentPart(inputPath);

    logger.info('Requesting OCR transcription', {
      model: this.model,
      input_path: inputPath,
      prompt_version: PROMPT_VERSION,
    });

    const startTime = Date.now();

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: OCR_SYSTEM_PROMPT },
          {
            role: 'user',
            content: [{ type: 'text', text: 'Transcribe this contract to Markdown.' }, content],
          },
        ],
      });

      const duration = (Date.now() - startTime) / 1000;
      ocrRequestsCounter.inc({ model: this.model, status: 'success' });
      ocrRequestDurationHistogram.observe({ model: this.model }, duration);

      const markdownText = response.choices[0]?.message.content ?? '';
      if (!markdownText) {
        logger.warn('OCR response contained no markdown', { model: this.model, input_path: inputPath });
      }

      return {
        inputPath,
        markdown: { markdown_text: markdownText },
        json: {
          input_path: inputPath,
          model: this.model,
          request_id: response.id,
          prompt_version: PROMPT_VERSION,
          markdown: { markdown_text: markdownText },
        },
      };
    } catch (error) {
      ocrRequestsCounter.inc({ model: this.model, status: 'error' });
      logger.error('OCR request failed', error, { model: this.model, input_path: inputPath });
      throw new OcrEngineError(
        `OCR request failed for ${inputPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}
