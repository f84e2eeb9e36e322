import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { buildIndexDocuments, parseCatalog } from '../src/catalog-parser';
import { HashingEmbedder, cosineSimilarity, tokenize } from '../src/embeddings';
import type { Embedder } from '../src/embeddings';
import { IndexBuildError } from '../src/errors';
import { KnowledgeIndex } from '../src/knowledge-index';
import { SwitchableEmbedder, makeTempDir, removeDir } from './helpers';

const CATALOG = [
  'card_name,category,rate,activation_required,valid_until,conditions',
  'Fuel Saver,fuel,3%,no,,Gas stations only',
  'Dining Plus,dining,5%,yes,2099-06-30,Restaurants and cafes',
  'Web Shopper,online,6%,yes,,Online merchants',
  'Globe Trotter,travel,4%,no,,Airlines and hotels',
  'Daily Basic,groceries,1%,no,,'
].join('\n');

const loadDocuments = async () => buildIndexDocuments(await parseCatalog(CATALOG));

describe('KnowledgeIndex', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('knowledge-index');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(dir);
  });

  it('returns every card when queried with its own text', async () => {
    const index = new KnowledgeIndex({ indexDir: dir, embedder: new HashingEmbedder() });
    const documents = await loadDocuments();
    const handle = await index.build(documents, 'v1');

    expect(index.documentCount(handle)).toBe(documents.length);
    for (const document of documents) {
      const [top] = await index.query(handle, document.text, 1);
      expect(top.document.id).toBe(document.id);
      expect(top.score).toBeCloseTo(1, 6);
    }
  });

  it('orders results by score and clamps k to the catalog size', async () => {
    const index = new KnowledgeIndex({ indexDir: dir, embedder: new HashingEmbedder() });
    const handle = await index.build(await loadDocuments(), 'v1');

    const results = await index.query(handle, 'restaurants and cafes for dinner', 100);

    expect(results).toHaveLength(5);
    const scores = results.map((result) => result.score);
    expect([...scores].sort((a, b) => b - a)).toEqual(scores);
    expect(results[0].document.id).toBe('Dining Plus');
  });

  it('exposes an immutable handle with name lookup', async () => {
    const index = new KnowledgeIndex({ indexDir: dir, embedder: new HashingEmbedder() });
    const handle = await index.build(await loadDocuments(), 'v1');

    expect(Object.isFrozen(handle)).toBe(true);
    expect(handle.sourceVersionId).toBe('v1');
    expect(index.findByName(handle, 'Web Shopper')?.card.rewards).toEqual({ online: 6 });
    expect(index.findByName(handle, 'Nope')).toBeNull();
    expect(index.cardNames(handle)).toEqual(['Daily Basic', 'Dining Plus', 'Fuel Saver', 'Globe Trotter', 'Web Shopper']);
  });

  it('refuses to build an empty index', async () => {
    const index = new KnowledgeIndex({ indexDir: dir, embedder: new HashingEmbedder() });
    await expect(index.build([], 'v1')).rejects.toBeInstanceOf(IndexBuildError);
  });

  it('refuses duplicate card names', async () => {
    const index = new KnowledgeIndex({ indexDir: dir, embedder: new HashingEmbedder() });
    const [first] = await loadDocuments();
    await expect(index.build([first, first], 'v1')).rejects.toThrow('Catalog documents must have unique card names');
  });

  it('wraps embedding failures in IndexBuildError and persists nothing', async () => {
    const embedder = new SwitchableEmbedder();
    embedder.failDocuments = true;
    const index = new KnowledgeIndex({ indexDir: dir, embedder });

    await expect(index.build(await loadDocuments(), 'v1')).rejects.toMatchObject({
      code: 'INDEX_BUILD_FAILED',
      message: 'Embedding failed: embedding service down'
    });
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it('rejects an embedder that drops vectors', async () => {
    const lossy: Embedder = {
      id: 'lossy',
      embedDocuments: async (texts) => texts.slice(1).map(() => [1, 0]),
      embedQuery: async () => [1, 0]
    };
    const index = new KnowledgeIndex({ indexDir: dir, embedder: lossy });

    await expect(index.build(await loadDocuments(), 'v1')).rejects.toThrow(
      'Embedder returned 4 vector(s) for 5 document(s)'
    );
  });

  it('reopens a persisted index for the same version and embedder only', async () => {
    const built = await new KnowledgeIndex({ indexDir: dir, embedder: new HashingEmbedder() }).build(
      await loadDocuments(),
      'v1'
    );

    const reopened = new KnowledgeIndex({ indexDir: dir, embedder: new HashingEmbedder() });
    const handle = await reopened.loadLatest('v1');
    expect(handle?.id).toBe(built.id);
    expect(handle?.entries).toHaveLength(5);

    expect(await reopened.loadLatest('v2')).toBeNull();
    expect(await new KnowledgeIndex({ indexDir: dir, embedder: new HashingEmbedder(64) }).loadLatest('v1')).toBeNull();
  });

  it('prunes every index file except the kept one', async () => {
    const index = new KnowledgeIndex({ indexDir: dir, embedder: new HashingEmbedder() });
    const older = await index.build(await loadDocuments(), 'v1');
    const kept = await index.build(await loadDocuments(), 'v2');
    await fs.writeFile(path.join(dir, 'index-interrupted.json.0000.tmp'), '{');
    await fs.writeFile(path.join(dir, 'notes.txt'), 'keep me');

    const removed = await index.prune(kept);

    expect(removed.sort()).toEqual([path.basename(older.filePath), 'index-interrupted.json.0000.tmp'].sort());
    expect((await fs.readdir(dir)).sort()).toEqual([path.basename(kept.filePath), 'notes.txt'].sort());
    expect(index.documentCount(older)).toBe(5);
  });

  it('removes its temp file when the final rename fails', async () => {
    const index = new KnowledgeIndex({ indexDir: dir, embedder: new HashingEmbedder() });
    vi.spyOn(fs, 'rename').mockRejectedValueOnce(new Error('disk full'));

    await expect(index.build(await loadDocuments(), 'v1')).rejects.toBeInstanceOf(IndexBuildError);

    expect(await fs.readdir(dir)).toEqual([]);
  });
});

describe('embeddings', () => {
  it('scores identical vectors 1 and a zero vector 0', () => {
    expect(cosineSimilarity([1, 2, 3], [1, 2, 3])).toBeCloseTo(1, 10);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('splits latin words and Chinese characters with bigrams', () => {
    expect(tokenize('Gas 3% 加油站')).toEqual(['gas', '3%', '加', '油', '站', '加油', '油站']);
  });

  it('scores orthogonal vectors 0 and refuses mismatched dimensions', () => {
    expect(cosineSimilarity([1, 0], [0, 2])).toBe(0);
    expect(cosineSimilarity([1, 1], [2, 2])).toBeCloseTo(1, 10);
    expect(() => cosineSimilarity([1, 2], [1, 2, 3])).toThrow('Cannot compare vectors of 2 and 3 dimensions');
  });

  it('produces unit-length hashing vectors', async () => {
    const [vector] = await new HashingEmbedder(32).embedDocuments(['need gas tonight']);
    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    expect(vector).toHaveLength(32);
    expect(norm).toBeCloseTo(1, 10);
  });
});
