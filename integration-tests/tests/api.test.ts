/**
 * Extraction API Tests
 *
 * The app runs in process on an ephemeral port with a scripted model client.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import type { Server } from 'node:http';
import {
  BatchOrchestrator,
  ExtractionSession,
  type ExtractionRuntime,
} from '@inbox-entities/shared';
import { createApp, type StreamEvent } from '../../services/extraction-api/src/app';
import { ScriptedChatClient, emailOf, recordingSleep, waitFor, type Script } from './support';

describe('Extraction API', () => {
  let server: Server;
  let baseUrl: string;
  let script: Script;
  let tmpDir: string;
  let client: ScriptedChatClient;

  beforeAll(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'api-'));

    client = new ScriptedChatClient((request, call) => script(request, call));
    const session = new ExtractionSession(client, {
      model: 'test-model',
      sleep: recordingSleep().sleep,
    });
    const runtime: ExtractionRuntime = {
      client,
      session,
      orchestrator: new BatchOrchestrator(session),
    };

    const app = createApp(runtime, {
      workerConcurrency: 2,
      timingLevels: [1],
      timingOutputFile: path.join(tmpDir, 'performance.txt'),
    });

    await new Promise<void>((resolve) => {
      server = app.listen(0, '127.0.0.1', () => resolve());
    });
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('test server has no TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function post(route: string, body: unknown, headers: Record<string, string> = {}) {
    return fetch(`${baseUrl}${route}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
    });
  }

  async function events(response: Response): Promise<StreamEvent[]> {
    const text = await response.text();
    return text
      .split('\n')
      .filter((line) => line.length > 0)
      .map((line) => JSON.parse(line));
  }

  it('reports health', async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: 'healthy', service: 'extraction-api' });
  });

  it('exposes Prometheus metrics', async () => {
    const response = await fetch(`${baseUrl}/metrics`);
    expect(response.status).toBe(200);
    expect(await response.text()).toContain('inbox_entities_extraction_sessions_total');
  });

  describe('POST /extract', () => {
    it('streams tokens followed by done', async () => {
      script = () => ({ fragments: ['{"entities"', ': []}'] });

      const response = await post('/extract', { email_text: 'Lunch on Friday', entity_types: ['Date'] });

      expect(response.status).toBe(200);
      expect(response.headers.get('content-type')).toBe('application/x-ndjson; charset=utf-8');
      expect(await events(response)).toEqual([
        { type: 'token', text: '{"entities"' },
        { type: 'token', text: ': []}' },
        { type: 'done' },
      ]);
    });

    it('announces a retry so the client can drop the failed attempt', async () => {
      let calls = 0;
      script = () =>
        calls++ === 0
          ? { fragments: ['{"ent'], failAfter: 1, error: new Error('connection reset') }
          : { fragments: ['{}'] };

      const response = await post('/extract', { email_text: 'Invoice attached' });

      expect(await events(response)).toEqual([
        { type: 'token', text: '{"ent' },
        { type: 'retry', attempt: 1, delay_ms: 1000, error: 'connection reset' },
        { type: 'token', text: '{}' },
        { type: 'done' },
      ]);
    });

    it('ends with an error event once retries are exhausted', async () => {
      script = () => ({ fragments: [], failAfter: 0, error: new Error('ECONNREFUSED') });

      const response = await post('/extract', { email_text: 'Hello' });

      expect(response.status).toBe(200);
      expect(await events(response)).toEqual([
        { type: 'retry', attempt: 1, delay_ms: 1000, error: 'ECONNREFUSED' },
        { type: 'retry', attempt: 2, delay_ms: 2000, error: 'ECONNREFUSED' },
        { type: 'error', message: 'ECONNREFUSED' },
      ]);
    });

    it('abandons the model stream when the client disconnects', async () => {
      script = () => ({ fragments: ['{"ent'], stallAfter: 1 });
      const callsBefore = client.calls.length;
      const closedBefore = client.closed;
      const controller = new AbortController();

      const response = await fetch(`${baseUrl}/extract`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ email_text: 'Call Ana tomorrow' }),
        signal: controller.signal,
      });
      const reader = response.body?.getReader();
      if (!reader) {
        throw new Error('response has no body');
      }
      const first = await reader.read();
      expect(new TextDecoder().decode(first.value)).toBe('{"type":"token","text":"{\\"ent"}\n');

      controller.abort();

      await waitFor(() => client.closed === closedBefore + 1);
      expect(client.inFlight).toBe(0);
      expect(client.calls.length - callsBefore).toBe(1);
    });

    it('rejects an invalid body with the error envelope', async () => {
      const response = await post('/extract', { entity_types: ['Date'] }, { 'X-Correlation-Id': 'corr-1' });

      expect(response.status).toBe(400);
      expect(response.headers.get('x-correlation-id')).toBe('corr-1');
      expect(await response.json()).toEqual({
        error: {
          code: 'invalid_request',
          message: 'Invalid extract request',
          correlation_id: 'corr-1',
          details: ["/: must have required property 'email_text'"],
        },
      });
    });
  });

  describe('POST /extract/batch', () => {
    it('returns ordered results with failures in place', async () => {
      script = (request) =>
        emailOf(request) === 'broken'
          ? { fragments: [], failAfter: 0, error: new Error('timeout') }
          : { fragments: [`{"email": "${emailOf(request)}"}`], delayMs: emailOf(request) === 'A' ? 20 : 0 };

      const response = await post('/extract/batch', { emails: ['A', 'broken', 'C'] });

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({
        results: [
          { index: 0, raw_text: '{"email": "A"}' },
          { index: 1, raw_text: 'Error: timeout' },
          { index: 2, raw_text: '{"email": "C"}' },
        ],
      });
    });

    it('rejects a worker limit below one', async () => {
      const response = await post('/extract/batch', { emails: ['A'], worker_limit: 0 });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({
        error: { code: 'invalid_request', details: ['/worker_limit: must be >= 1'] },
      });
    });
  });

  describe('POST /measure', () => {
    it('runs the sweep and writes the report file', async () => {
      script = () => ({ fragments: ['{}'] });

      const response = await post('/measure', { emails: ['only'] });
      const expected = 'SMT = 1\nNon Batch: 0min 0sec\nBatch: 0min 0sec\n\n';

      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({ report: expected, levels: [{ level: 1 }] });
      expect(fs.readFileSync(path.join(tmpDir, 'performance.txt'), 'utf-8')).toBe(expected);
    });

    it('answers 500 when the report file cannot be written', async () => {
      script = () => ({ fragments: ['{}'] });
      const outputFile = path.join(tmpDir, 'performance.txt');
      fs.rmSync(outputFile, { force: true });
      fs.mkdirSync(outputFile);

      const response = await post('/measure', { emails: ['only'], levels: [1] });

      expect(response.status).toBe(500);
      expect(await response.json()).toMatchObject({ error: { code: 'internal_error' } });
      fs.rmSync(outputFile, { recursive: true, force: true });
    });

    it('answers 502 when the model keeps failing', async () => {
      script = () => ({ fragments: [], failAfter: 0, error: new Error('model not loaded') });

      const response = await post('/measure', { emails: ['only'], levels: [1] });

      expect(response.status).toBe(502);
      expect(await response.json()).toMatchObject({
        error: { code: 'bad_gateway', message: 'model not loaded' },
      });
    });
  });
});
