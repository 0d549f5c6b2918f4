/**
 * Contract API Tests
 *
 * Runs the express app in-process against an in-memory job queue.
 */

import type { Server } from 'http';
import path from 'path';
import { config, type ContractOcrJob, type ErrorEnvelope, type ExtractResponse } from '@contract-ocr/shared';
import { createApp, resolveOutputDir, type ContractJobQueue } from '../../services/contract-api/src/app';

class InMemoryJobQueue implements ContractJobQueue {
  jobs: ContractOcrJob[] = [];
  depth = 0;
  reject = false;

  async enqueue(job: ContractOcrJob): Promise<void> {
    this.jobs.push(job);
    this.depth += 1;
  }

  async backpressure() {
    return { shouldWarn: false, shouldReject: this.reject, depth: this.depth };
  }
}

let server: Server;
let baseUrl: string;
let queue: InMemoryJobQueue;

beforeEach(async () => {
  queue = new InMemoryJobQueue();
  server = createApp(queue).listen(0);
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));

  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server did not bind to a TCP port');
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterEach(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

function postJson(route: string, body: unknown, headers: Record<string, string> = {}) {
  return fetch(`${baseUrl}${route}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  });
}

describe('GET /health', () => {
  it('should report queue depth', async () => {
    queue.depth = 4;

    const response = await fetch(`${baseUrl}/health`);
    const body = (await response.json()) as { status: string; queue_depth: number };

    expect(response.status).toBe(200);
    expect(body.status).toBe('healthy');
    expect(body.queue_depth).toBe(4);
  });
});

describe('GET /metrics', () => {
  it('should expose extraction metrics', async () => {
    const response = await fetch(`${baseUrl}/metrics`);

    expect(response.status).toBe(200);
    expect(await response.text()).toContain('contract_ocr_extractions_total');
  });
});

describe('POST /extract', () => {
  it('should return fields, sources and missing fields', async () => {
    const response = await postJson(
      '/extract',
      { segments: ['| 甲方 | 北京星河科技有限公司 |', { markdown_text: 'Party B: Globex Ltd' }] },
      { 'X-Correlation-Id': 'corr-extract-1' }
    );
    const body = (await response.json()) as ExtractResponse;

    expect(response.status).toBe(200);
    expect(response.headers.get('x-correlation-id')).toBe('corr-extract-1');
    expect(body.correlation_id).toBe('corr-extract-1');
    expect(body.fields).toEqual({
      party_a: '北京星河科技有限公司',
      party_b: 'Globex Ltd',
      contract_amount: null,
      sign_date: null,
      effective_date: null,
      termination_date: null,
    });
    expect(body.sources).toEqual({
      party_a: '| 甲方 | 北京星河科技有限公司 |',
      party_b: 'Party B: Globex Ltd',
    });
    expect(body.origins).toEqual({ party_a: 'table', party_b: 'pattern' });
    expect(body.missing_fields).toEqual(['contract_amount', 'sign_date', 'effective_date', 'termination_date']);
  });

  it('should reject unsupported segment types', async () => {
    const response = await postJson('/extract', { segments: ['ok', 7] });
    const body = (await response.json()) as ErrorEnvelope;

    expect(response.status).toBe(400);
    expect(body.error.code).toBe('unsupported_segment_type');
    expect(body.error.message).toBe('Unsupported markdown segment type: number');
  });

  it('should reject a body without segments', async () => {
    const response = await postJson('/extract', { markdown: 'Party A: Acme' });
    const body = (await response.json()) as ErrorEnvelope;

    expect(response.status).toBe(400);
    expect(body.error.code).toBe('invalid_request');
  });

  it('should reject malformed JSON', async () => {
    const response = await fetch(`${baseUrl}/extract`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"segments": [',
    });
    const body = (await response.json()) as ErrorEnvelope;

    expect(response.status).toBe(400);
    expect(body.error.code).toBe('invalid_request');
  });
});

describe('POST /contracts', () => {
  it('should queue a contract job under the output root', async () => {
    const response = await postJson(
      '/contracts',
      { inputs: ['/data/contracts/lease.pdf'], output_dir: 'reviews/lease' },
      { 'X-Correlation-Id': 'corr-submit-1' }
    );
    const body = (await response.json()) as { correlation_id: string; document_id: string };

    expect(response.status).toBe(202);
    expect(body.correlation_id).toBe('corr-submit-1');
    expect(body.document_id).toMatch(/^contract_[0-9A-Z]{26}$/);
    expect(queue.jobs).toHaveLength(1);
    expect(queue.jobs[0]).toMatchObject({
      event_type: 'contract.submitted',
      correlation_id: 'corr-submit-1',
      document_id: body.document_id,
      inputs: ['/data/contracts/lease.pdf'],
      output_dir: path.resolve(config.outputRoot, 'reviews/lease'),
    });
  });

  it('should default the output directory to the document id', async () => {
    const response = await postJson('/contracts', { inputs: ['/data/contracts/lease.pdf'] });
    const body = (await response.json()) as { document_id: string };

    expect(response.status).toBe(202);
    expect(queue.jobs[0].output_dir).toBe(path.resolve(config.outputRoot, body.document_id));
  });

  it('should reject output directories outside the root', async () => {
    const response = await postJson('/contracts', { inputs: ['/data/a.pdf'], output_dir: '../../etc' });
    const body = (await response.json()) as ErrorEnvelope;

    expect(response.status).toBe(400);
    expect(body.error.code).toBe('invalid_request');
    expect(queue.jobs).toHaveLength(0);
  });

  it('should reject an empty input list', async () => {
    const response = await postJson('/contracts', { inputs: [] });

    expect(response.status).toBe(400);
  });

  it('should shed load under backpressure', async () => {
    queue.reject = true;

    const response = await postJson('/contracts', { inputs: ['/data/a.pdf'] });
    const body = (await response.json()) as ErrorEnvelope;

    expect(response.status).toBe(503);
    expect(body.error.code).toBe('service_unavailable');
    expect(queue.jobs).toHaveLength(0);
  });
});

describe('resolveOutputDir', () => {
  it('should confine directories to the root', () => {
    expect(resolveOutputDir('/srv/out', 'contract_1')).toBe('/srv/out/contract_1');
    expect(resolveOutputDir('/srv/out', 'contract_1', 'a/b')).toBe('/srv/out/a/b');
    expect(resolveOutputDir('/srv/out', 'contract_1', '/tmp/x')).toBeNull();
    expect(resolveOutputDir('/srv/out', 'contract_1', '..')).toBeNull();
  });
});
