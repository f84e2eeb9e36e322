import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { buildIndexDocuments, parseCatalog } from '../src/catalog-parser';
import { HashingEmbedder } from '../src/embeddings';
import type { Embedder } from '../src/embeddings';
import { KnowledgeIndex } from '../src/knowledge-index';
import type { IndexHandle } from '../src/knowledge-index';
import type { AnswerGenerator, GroundingFact } from '../src/generation';
import type { CatalogSource, FetchOutcome } from '../src/remote-source';
import { RemoteFetchError } from '../src/errors';

export const FUEL_CATALOG = [
  'card_name,category,rate,activation_required,valid_until,conditions',
  'CardA,fuel,3%,no,,',
  'CardB,fuel,2%,yes,,'
].join('\n');

export const makeTempDir = (prefix: string) => fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));

export const removeDir = (dir: string) => fs.rm(dir, { recursive: true, force: true });

export const buildHandle = async (
  index: KnowledgeIndex,
  csv: string,
  sourceVersionId = 'test-version'
): Promise<IndexHandle> => index.build(buildIndexDocuments(await parseCatalog(csv)), sourceVersionId);

/** Wraps the hashing embedder so a test can make either call fail on demand. */
export class SwitchableEmbedder implements Embedder {
  readonly id = 'switchable';
  failDocuments = false;
  failQueries = false;
  private readonly inner = new HashingEmbedder();

  async embedDocuments(texts: string[]): Promise<number[][]> {
    if (this.failDocuments) {
      throw new Error('embedding service down');
    }
    return this.inner.embedDocuments(texts);
  }

  async embedQuery(text: string): Promise<number[]> {
    if (this.failQueries) {
      throw new Error('embedding service down');
    }
    return this.inner.embedQuery(text);
  }
}

export class RecordingGenerator implements AnswerGenerator {
  readonly calls: Array<{ prompt: string; facts: GroundingFact[] }> = [];

  constructor(private readonly respond: (facts: GroundingFact[]) => Promise<string>) {}

  async generate(prompt: string, facts: GroundingFact[]): Promise<string> {
    this.calls.push({ prompt, facts });
    return this.respond(facts);
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
}

export const deferred = <T>(): Deferred<T> => {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((done) => {
    resolve = done;
  });
  return { promise, resolve };
};

export class FakeCatalogSource implements CatalogSource {
  readonly name = 'fake';
  calls = 0;

  constructor(private readonly next: () => Promise<FetchOutcome>) {}

  fetchLatestFile(): Promise<FetchOutcome> {
    this.calls += 1;
    return this.next();
  }
}

export const fetched = (csv: string): FetchOutcome => ({
  status: 'fetched',
  content: Buffer.from(csv, 'utf-8'),
  source: 'fake'
});

export const unavailable = (message: string): FetchOutcome => ({
  status: 'unavailable',
  error: new RemoteFetchError('fake', message)
});
