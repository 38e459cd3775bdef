/**
 * Integration tests for the HTTP API.
 *
 * Uses a real Express app over an in-memory catalog and a hashing embedder.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Server } from 'node:http';
import type Database from 'better-sqlite3-multiple-ciphers';
import { DEFAULT_CONFIG } from '../../src/config/recommender-config.js';
import { RecommendationEngine } from '../../src/recommendation/recommendation-engine.js';
import { RetrievalEngine } from '../../src/retrieval/retrieval-engine.js';
import { createApp } from '../../src/server/app.js';
import { CatalogStore } from '../../src/storage/catalog-store.js';
import { openDatabase } from '../../src/storage/db.js';
import { setLogLevel } from '../../src/utils/logger.js';
import { VERSION } from '../../src/version.js';
import { HashingEmbedder } from '../helpers/hashing-embedder.js';
import { makeRecord } from '../helpers/records.js';

setLogLevel('silent');

const JAVA = makeRecord({ name: 'Java Programming', category: 'Technical', description: 'java classes interfaces' });
const SALES = makeRecord({ name: 'Sales Negotiation', description: 'persuasion closing deals' });
const NUMERACY = makeRecord({ name: 'Numerical Reasoning', description: 'percentages ratios' });

let db: Database.Database;
let store: CatalogStore;
let server: Server;
let baseUrl: string;

async function request(path: string, init?: RequestInit): Promise<{ status: number; body: unknown }> {
  const res = await globalThis.fetch(`${baseUrl}${path}`, init);
  return { status: res.status, body: await res.json() };
}

function post(path: string, body: unknown): Promise<{ status: number; body: unknown }> {
  return request(path, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(body),
  });
}

beforeEach(async () => {
  db = openDatabase({ dbPath: ':memory:', encryption: { enabled: false, cipher: 'chacha20' } });
  const embedder = new HashingEmbedder();
  store = new CatalogStore(db, embedder, 'catalog');
  const retrieval = new RetrievalEngine(embedder, store, { topK: 10 });
  const recommender = new RecommendationEngine(retrieval, null, DEFAULT_CONFIG.generation);

  const app = createApp({ recommender, index: store });
  await new Promise<void>((resolve) => {
    server = app.listen(0, () => {
      const addr = server.address();
      if (addr && typeof addr === 'object') {
        baseUrl = `http://localhost:${addr.port}`;
      }
      resolve();
    });
  });
});

afterEach(async () => {
  await new Promise<void>((resolve) => {
    server.close(() => resolve());
  });
  db.close();
});

describe('GET /health', () => {
  it('reports degraded before the index is built', async () => {
    const res = await request('/health');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'degraded', version: VERSION, catalogSize: 0 });
  });

  it('reports healthy with the catalog size after a build', async () => {
    await store.build([JAVA, SALES, NUMERACY]);

    const res = await request('/health');

    expect(res.body).toEqual({ status: 'healthy', version: VERSION, catalogSize: 3 });
  });
});

describe('POST /recommend', () => {
  beforeEach(async () => {
    await store.build([JAVA, SALES, NUMERACY]);
  });

  it('recommends from free text', async () => {
    const res = await post('/recommend', { query: 'java classes', k: 1, explain: false });

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      queryText: 'java classes',
      retrievalCount: 1,
      recommendations: [{ rank: 1, name: 'Java Programming', category: 'Technical', url: JAVA.url }],
    });
  });

  it('recommends from a structured query with comma-separated skills', async () => {
    const res = await post('/recommend', {
      title: 'Account Executive',
      skills: 'persuasion, closing deals',
      experienceLevel: 'Senior',
      k: 2,
      explain: false,
    });

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      queryText: 'Job Title: Account Executive | Required Skills: persuasion, closing deals | Experience Level: Senior',
      retrievalCount: 2,
      recommendations: [{ rank: 1, name: 'Sales Negotiation' }, { rank: 2 }],
    });
  });

  it('returns retrieval results with an explanation error when no generator is configured', async () => {
    const res = await post('/recommend', { query: 'java', k: 1, explain: true });

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      retrievalCount: 1,
      explanationError: 'No explanation generator is configured',
    });
  });

  it('rejects invalid bodies with 400', async () => {
    expect(await post('/recommend', { query: 'java', k: 0 })).toEqual({
      status: 400,
      body: { error: '"k" must be a positive integer' },
    });
    expect(await post('/recommend', { title: 'Dev' })).toEqual({
      status: 400,
      body: { error: 'Provide "query", or "title", "skills" and "experienceLevel"' },
    });
    expect(await post('/recommend', { query: '  ' })).toEqual({
      status: 400,
      body: { error: '"query" must not be empty' },
    });
  });

  it('rejects malformed JSON with 400', async () => {
    const res = await request('/recommend', {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{"query": ',
    });

    expect(res.status).toBe(400);
    expect(res.body).toHaveProperty('error');
  });
});

describe('POST /recommend before a build', () => {
  it('answers 503 with the error code', async () => {
    const res = await post('/recommend', { query: 'java' });

    expect(res).toEqual({
      status: 503,
      body: { error: 'Collection "catalog" has not been built', code: 'INDEX_NOT_BUILT' },
    });
  });
});

describe('unknown routes', () => {
  it('returns 404', async () => {
    expect(await request('/nope')).toEqual({ status: 404, body: { error: 'Not found' } });
  });
});
