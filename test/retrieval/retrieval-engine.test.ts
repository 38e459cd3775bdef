/**
 * Retrieval engine tests over a real in-memory catalog store and a
 * deterministic hashing embedder.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3-multiple-ciphers';
import { RetrievalEngine, toQueryText } from '../../src/retrieval/retrieval-engine.js';
import { toRetrievalResultDto } from '../../src/retrieval/dto.js';
import { CatalogStore } from '../../src/storage/catalog-store.js';
import { openDatabase } from '../../src/storage/db.js';
import { RetrievalError } from '../../src/utils/errors.js';
import { setLogLevel } from '../../src/utils/logger.js';
import { HashingEmbedder } from '../helpers/hashing-embedder.js';
import { makeRecord } from '../helpers/records.js';

setLogLevel('silent');

const JAVA = makeRecord({
  name: 'Java Programming',
  category: 'Technical',
  description: 'object oriented java coding with classes and interfaces',
  skillsMeasured: ['Java'],
});
const SALES = makeRecord({
  name: 'Sales Negotiation',
  category: 'Behavioral',
  description: 'persuasion closing deals with customers',
  skillsMeasured: ['Negotiation'],
});
const NUMERACY = makeRecord({
  name: 'Numerical Reasoning',
  category: 'Cognitive',
  description: 'arithmetic percentages ratios and data interpretation',
  skillsMeasured: ['Numeracy'],
});

describe('toQueryText', () => {
  it('trims free text', () => {
    expect(toQueryText('  python developer ')).toBe('python developer');
  });

  it('rejects blank free text with EMPTY_QUERY', () => {
    expect(() => toQueryText('   ')).toThrow(RetrievalError);
    expect(() => toQueryText('')).toThrow('Query text is empty');
  });

  it('canonicalizes structured queries', () => {
    expect(toQueryText({ title: 'Dev', skills: ['Go'], experienceLevel: 'Senior' })).toBe(
      'Job Title: Dev | Required Skills: Go | Experience Level: Senior',
    );
  });
});

describe('RetrievalEngine', () => {
  let db: Database.Database;
  let embedder: HashingEmbedder;
  let store: CatalogStore;
  let engine: RetrievalEngine;

  beforeEach(() => {
    db = openDatabase({ dbPath: ':memory:', encryption: { enabled: false, cipher: 'chacha20' } });
    embedder = new HashingEmbedder();
    store = new CatalogStore(db, embedder, 'catalog');
    engine = new RetrievalEngine(embedder, store, { topK: 10 });
  });

  afterEach(() => {
    db.close();
  });

  it('fails with INDEX_NOT_BUILT before a build', async () => {
    await expect(engine.retrieve('java')).rejects.toMatchObject({ code: 'INDEX_NOT_BUILT' });
  });

  it('returns [] for an empty catalog', async () => {
    await store.build([]);
    expect(await engine.retrieve('java developer', 5)).toEqual([]);
  });

  describe('with a catalog', () => {
    beforeEach(async () => {
      await store.build([JAVA, SALES, NUMERACY]);
    });

    it('ranks the closest record first', async () => {
      const results = await engine.retrieve('java coding classes interfaces object oriented', 2);

      expect(results).toHaveLength(2);
      expect(results[0].record.id).toBe(JAVA.id);
      expect(results[0].similarityScore).toBeGreaterThan(results[1].similarityScore);
    });

    it('numbers ranks from 1 with non-increasing scores', async () => {
      const results = await engine.retrieve('data interpretation for sales customers');

      expect(results.map((r) => r.rank)).toEqual([1, 2, 3]);
      for (let i = 1; i < results.length; i++) {
        expect(results[i].similarityScore).toBeLessThanOrEqual(results[i - 1].similarityScore);
      }
    });

    it('returns every neighbor however weak', async () => {
      const results = await engine.retrieve('zzzz unrelated', 3);
      expect(results).toHaveLength(3);
    });

    it('uses the configured default k', async () => {
      const small = new RetrievalEngine(embedder, store, { topK: 1 });
      expect(small.defaultK).toBe(1);
      expect(await small.retrieve('java')).toHaveLength(1);
    });

    it('embeds the canonical text as a query', async () => {
      const query = { title: 'Developer', skills: ['Java'], experienceLevel: 'Mid' };

      const { queryText } = await engine.retrieveWithText(query, 1);

      expect(queryText).toBe('Job Title: Developer | Required Skills: Java | Experience Level: Mid');
      expect(embedder.calls.at(-1)).toEqual({ texts: [queryText], isQuery: true });
    });

    it('is deterministic for a repeated structured query', async () => {
      const query = { title: 'Analyst', skills: ['percentages', 'ratios'], experienceLevel: 'Graduate' };

      const first = await engine.retrieve(query, 3);
      const second = await engine.retrieve(query, 3);

      expect(second).toEqual(first);
    });

    it('rejects an invalid k before embedding', async () => {
      const before = embedder.calls.length;
      await expect(engine.retrieve('java', 2.5)).rejects.toMatchObject({ code: 'INVALID_K' });
      expect(embedder.calls.length).toBe(before);
    });

    it('returns [] for k = 0', async () => {
      expect(await engine.retrieve('java', 0)).toEqual([]);
    });
  });

  it('differentiates queries with disjoint vocabularies', async () => {
    const engineering = ['compiler', 'kernel', 'debugger', 'linker', 'profiler'].map((word, i) =>
      makeRecord({ name: `Engineering ${i}`, description: `${word} internals`, skillsMeasured: [word] }),
    );
    const hospitality = ['banquet', 'concierge', 'housekeeping', 'reception', 'catering'].map((word, i) =>
      makeRecord({ name: `Hospitality ${i}`, description: `${word} service`, skillsMeasured: [word] }),
    );
    await store.build([...engineering, ...hospitality]);

    const first = await engine.retrieve('compiler kernel debugger linker profiler internals', 5);
    const second = await engine.retrieve('banquet concierge housekeeping reception catering service', 5);

    const ids = (results: typeof first) => new Set(results.map((r) => r.record.id));
    expect(ids(first)).not.toEqual(ids(second));
    expect(ids(first)).toEqual(new Set(engineering.map((r) => r.id)));
  });

  it('flattens results for JSON', async () => {
    await store.build([JAVA]);
    const [result] = await engine.retrieve('java', 1);

    expect(toRetrievalResultDto(result)).toEqual({
      rank: 1,
      name: 'Java Programming',
      category: 'Technical',
      description: 'object oriented java coding with classes and interfaces',
      skillsMeasured: 'Java',
      jobSuitability: '',
      experienceLevel: '',
      duration: '',
      deliveryMethod: '',
      url: 'https://catalog.test/java-programming',
      similarityScore: result.similarityScore,
    });
  });
});
