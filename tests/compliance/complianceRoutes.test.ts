import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { Server } from 'http';
import { z } from 'zod';
import { createApp } from '../../src/server/app.js';
import { ComplianceVerificationService } from '../../src/server/services/compliance/ComplianceVerificationService.js';
import { FakeProvider, buildWorkbook, instantPolicy, judgment, loadWorkbook, parameterOf } from './helpers.js';

const provider = new FakeProvider((prompt) =>
  parameterOf(prompt) === 'Lead'
    ? judgment({ status: 'MISMATCH', observed_value: '0.08', observed_unit: 'mg/kg', rationale: 'Lead reported' })
    : judgment({ status: 'MATCH', observed_value: 'Vanilla Extract', rationale: 'Product name is identical' })
);

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  const app = createApp({ service: new ComplianceVerificationService({ provider, policy: instantPolicy }) });
  server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
});

const verifyResponseSchema = z.object({
  runId: z.string(),
  warnings: z.array(z.string()),
  report: z.object({
    summary: z.object({ documentCount: z.number() }),
    documents: z.array(z.object({ status: z.string(), counts: z.record(z.number()) })),
  }),
  corrections: z.array(
    z.object({ documentId: z.string(), correctedCells: z.number(), correctedSpreadsheet: z.string().nullable() })
  ),
  reportWorkbook: z.string(),
});

function post(path: string, body: unknown): Promise<Response> {
  return fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

async function specification(): Promise<string> {
  const bytes = await buildWorkbook([
    ['Parameter', 'Specification'],
    ['Product Name', 'Vanilla Extract'],
    ['Lead', '<0.05'],
  ]);
  return bytes.toString('base64');
}

describe('POST /api/compliance/verify', () => {
  it('returns the report, the report workbook and the corrected master', async () => {
    const response = await post('/api/compliance/verify', {
      specification: await specification(),
      documents: [{ documentId: 'coa-1', rawText: 'Lead (Pb): 0.08 mg/kg' }],
      options: { timeoutMs: 0 },
    });

    expect(response.status).toBe(200);
    const body = verifyResponseSchema.parse(await response.json());
    expect(body.warnings).toEqual([]);
    expect(body.report.summary.documentCount).toBe(1);
    expect(body.report.documents[0]?.status).toBe('Needs Review');
    expect(body.report.documents[0]?.counts).toEqual({ total: 2, match: 1, mismatch: 1, notFound: 0, error: 0 });
    expect(body.corrections).toEqual([
      { documentId: 'coa-1', correctedCells: 1, correctedSpreadsheet: expect.any(String) },
    ]);

    const correctedSpreadsheet = body.corrections[0]?.correctedSpreadsheet ?? '';
    const corrected = await loadWorkbook(Buffer.from(correctedSpreadsheet, 'base64'));
    expect(corrected.getWorksheet('Spec')?.getCell('B3').value).toBe('0.08');
    const report = await loadWorkbook(Buffer.from(body.reportWorkbook, 'base64'));
    expect(report.worksheets.map((sheet) => sheet.name)).toEqual(['Summary', 'Verdicts']);
  });

  it('rejects a request without documents', async () => {
    const response = await post('/api/compliance/verify', { specification: await specification(), documents: [] });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({
      code: 'BAD_REQUEST',
      message: 'Validation failed',
      context: { details: [{ path: 'documents', message: 'At least one document is required' }] },
    });
  });

  it('rejects duplicate document identifiers', async () => {
    const response = await post('/api/compliance/verify', {
      specification: await specification(),
      documents: [{ documentId: 'coa-1' }, { documentId: 'coa-1' }],
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ code: 'BAD_REQUEST', message: 'Duplicate documentId "coa-1"' });
  });

  it('answers 422 for a master file that is not a workbook', async () => {
    const response = await post('/api/compliance/verify', {
      specification: 'aGVsbG8=',
      documents: [{ documentId: 'coa-1', rawText: 'x' }],
    });

    expect(response.status).toBe(422);
    expect(await response.json()).toMatchObject({ code: 'MALFORMED_SPECIFICATION' });
  });

  it('answers 400 for a body that is not JSON', async () => {
    const response = await fetch(`${baseUrl}/api/compliance/verify`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"specification":',
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ message: 'Request body is not valid JSON' });
  });
});

describe('service routes', () => {
  it('reports health', async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: 'ok' });
  });

  it('echoes the request id', async () => {
    const response = await fetch(`${baseUrl}/health`, { headers: { 'X-Request-ID': 'req-42' } });

    expect(response.headers.get('x-request-id')).toBe('req-42');
  });

  it('answers 404 for unknown routes', async () => {
    const response = await fetch(`${baseUrl}/api/unknown`);

    expect(response.status).toBe(404);
    expect(await response.json()).toMatchObject({
      code: 'NOT_FOUND',
      message: "Route with identifier 'GET /api/unknown' not found",
    });
  });
});
