/**
 * Recommendation engine tests: real retrieval over an in-memory store, fake
 * explanation generators.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type Database from 'better-sqlite3-multiple-ciphers';
import { DEFAULT_CONFIG, type GenerationSettings } from '../../src/config/recommender-config.js';
import type { ExplanationGenerator, ExplanationRequest } from '../../src/recommendation/explanation-generator.js';
import { RecommendationEngine } from '../../src/recommendation/recommendation-engine.js';
import { RetrievalEngine } from '../../src/retrieval/retrieval-engine.js';
import { CatalogStore } from '../../src/storage/catalog-store.js';
import { openDatabase } from '../../src/storage/db.js';
import { GenerationError } from '../../src/utils/errors.js';
import { setLogLevel } from '../../src/utils/logger.js';
import { HashingEmbedder } from '../helpers/hashing-embedder.js';
import { makeRecord } from '../helpers/records.js';

setLogLevel('silent');

const SETTINGS: GenerationSettings = { ...DEFAULT_CONFIG.generation, enabled: true, timeoutMs: 50 };

const CATALOG = [
  makeRecord({ name: 'Java Programming', description: 'java classes interfaces' }),
  makeRecord({ name: 'Sales Negotiation', description: 'persuasion closing deals' }),
  makeRecord({ name: 'Numerical Reasoning', description: 'percentages ratios' }),
];

class RecordingGenerator implements ExplanationGenerator {
  readonly requests: ExplanationRequest[] = [];

  constructor(private readonly reply: (request: ExplanationRequest, signal: AbortSignal) => Promise<string>) {}

  generate(request: ExplanationRequest, signal: AbortSignal): Promise<string> {
    this.requests.push(request);
    return this.reply(request, signal);
  }
}

describe('RecommendationEngine', () => {
  let db: Database.Database;
  let store: CatalogStore;
  let retrieval: RetrievalEngine;

  beforeEach(async () => {
    db = openDatabase({ dbPath: ':memory:', encryption: { enabled: false, cipher: 'chacha20' } });
    const embedder = new HashingEmbedder();
    store = new CatalogStore(db, embedder, 'catalog');
    await store.build(CATALOG);
    retrieval = new RetrievalEngine(embedder, store, { topK: 2 });
  });

  afterEach(() => {
    db.close();
  });

  it('attaches an explanation grounded on the retrieved records', async () => {
    const generator = new RecordingGenerator(async () => '1. Java Programming');
    const engine = new RecommendationEngine(retrieval, generator, SETTINGS);
    const query = { title: 'Java Developer', skills: ['java'], experienceLevel: 'Mid' };

    const result = await engine.recommend(query);

    expect(result.explanation).toBe('1. Java Programming');
    expect(result.explanationError).toBeUndefined();
    expect(result.retrievalCount).toBe(2);
    expect(result.queryText).toBe('Job Title: Java Developer | Required Skills: java | Experience Level: Mid');
    expect(generator.requests).toEqual([{ query, results: result.results }]);
  });

  it('honours k', async () => {
    const engine = new RecommendationEngine(retrieval, null, SETTINGS);

    const result = await engine.recommendFromText('java', { k: 3, explain: false });

    expect(result.results).toHaveLength(3);
    expect(result.retrievalCount).toBe(3);
  });

  it('skips generation when explain is false', async () => {
    const generator = new RecordingGenerator(async () => 'unused');
    const engine = new RecommendationEngine(retrieval, generator, SETTINGS);

    const result = await engine.recommendFromText('java', { explain: false });

    expect(generator.requests).toHaveLength(0);
    expect(result.explanation).toBeUndefined();
    expect(result.explanationError).toBeUndefined();
  });

  it('defaults explain to generation.enabled', async () => {
    const generator = new RecordingGenerator(async () => 'text');
    const engine = new RecommendationEngine(retrieval, generator, { ...SETTINGS, enabled: false });

    expect((await engine.recommendFromText('java')).explanation).toBeUndefined();
    expect((await engine.recommendFromText('java', { explain: true })).explanation).toBe('text');
  });

  it('keeps retrieval results when generation fails', async () => {
    const generator = new RecordingGenerator(async () => {
      throw new GenerationError('Explanation request failed: quota', 'GENERATION_FAILED');
    });
    const engine = new RecommendationEngine(retrieval, generator, SETTINGS);

    const result = await engine.recommendFromText('java');

    expect(result.results).toHaveLength(2);
    expect(result.explanation).toBeUndefined();
    expect(result.explanationError).toBe('Explanation request failed: quota');
  });

  it('reports a missing generator', async () => {
    const engine = new RecommendationEngine(retrieval, null, SETTINGS);

    const result = await engine.recommendFromText('java');

    expect(result.explanationError).toBe('No explanation generator is configured');
  });

  it('times out a generator that never answers', async () => {
    const generator = new RecordingGenerator(() => new Promise<string>(() => {}));
    const engine = new RecommendationEngine(retrieval, generator, SETTINGS);

    const result = await engine.recommendFromText('java');

    expect(result.explanationError).toBe('Explanation timed out after 50ms');
    expect(result.results).toHaveLength(2);
  });

  it('aborts the signal passed to the generator on timeout', async () => {
    let seen: AbortSignal | undefined;
    const generator = new RecordingGenerator(
      (_request, signal) =>
        new Promise<string>((_resolve, reject) => {
          seen = signal;
          signal.addEventListener('abort', () => reject(new Error('aborted by caller')));
        }),
    );
    const engine = new RecommendationEngine(retrieval, generator, SETTINGS);

    const result = await engine.recommendFromText('java');

    expect(seen?.aborted).toBe(true);
    expect(result.explanationError).toBe('Explanation timed out after 50ms');
  });

  it('does not call the generator for an empty result list', async () => {
    const emptyStore = new CatalogStore(db, new HashingEmbedder(), 'empty');
    await emptyStore.build([]);
    const generator = new RecordingGenerator(async () => 'unused');
    const engine = new RecommendationEngine(
      new RetrievalEngine(new HashingEmbedder(), emptyStore, { topK: 2 }),
      generator,
      SETTINGS,
    );

    const result = await engine.recommendFromText('java');

    expect(result.results).toEqual([]);
    expect(generator.requests).toHaveLength(0);
  });

  it('propagates retrieval errors', async () => {
    const engine = new RecommendationEngine(retrieval, null, SETTINGS);

    await expect(engine.recommendFromText('   ')).rejects.toMatchObject({ code: 'EMPTY_QUERY' });
  });

  it('stamps the generation time', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2024-03-01T09:00:00.000Z'));
    try {
      const engine = new RecommendationEngine(retrieval, null, SETTINGS);
      const result = await engine.recommendFromText('java', { explain: false });
      expect(result.generatedAt).toBe('2024-03-01T09:00:00.000Z');
    } finally {
      vi.useRealTimers();
    }
  });
});
