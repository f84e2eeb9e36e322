import fs from 'node:fs/promises';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import logger from './logger';
import { IndexBuildError, describeError } from './errors';
import { cosineSimilarity } from './embeddings';
import type { Embedder } from './embeddings';
import type { CardRecord, IndexDocument, IndexDocumentMetadata } from './catalog-parser';
import { isRecord, isStringArray } from './type-guards';
import { formatVersionStamp } from './version-store';

export interface IndexEntry {
  document: IndexDocument;
  vector: number[];
}

/**
 * An immutable, fully built index. Rebuilding produces a new handle; readers
 * holding an old one keep a consistent view until they drop it.
 */
export interface IndexHandle {
  readonly id: string;
  readonly builtAt: string;
  readonly sourceVersionId: string;
  readonly embedderId: string;
  readonly dimensions: number;
  readonly filePath: string;
  readonly entries: ReadonlyArray<IndexEntry>;
  readonly byName: ReadonlyMap<string, IndexDocument>;
}

export interface ScoredDocument {
  document: IndexDocument;
  score: number;
}

export interface KnowledgeIndexOptions {
  indexDir: string;
  embedder: Embedder;
  maxQueryK?: number;
  now?: () => Date;
}

interface PersistedIndex {
  id: string;
  builtAt: string;
  sourceVersionId: string;
  embedderId: string;
  dimensions: number;
  entries: IndexEntry[];
}

const FILE_PATTERN = /^index-.+\.json$/;
const TEMP_PATTERN = /^index-.+\.json\..+\.tmp$/;
export const DEFAULT_MAX_QUERY_K = 50;

const isNumberArray = (value: unknown): value is number[] =>
  Array.isArray(value) && value.every((entry) => typeof entry === 'number');

const isOptionalString = (value: unknown): value is string | null => value === null || typeof value === 'string';

const isCardRecord = (value: unknown): value is CardRecord => {
  if (!isRecord(value) || !isRecord(value.rewards)) return false;
  return (
    typeof value.name === 'string' &&
    isOptionalString(value.bank) &&
    Object.values(value.rewards).every((rate) => typeof rate === 'number') &&
    typeof value.activationRequired === 'boolean' &&
    isOptionalString(value.validFrom) &&
    isOptionalString(value.validUntil) &&
    (value.annualFee === null || typeof value.annualFee === 'number') &&
    typeof value.conditions === 'string'
  );
};

const isDocumentMetadata = (value: unknown): value is IndexDocumentMetadata =>
  isRecord(value) &&
  isStringArray(value.categories) &&
  typeof value.activationRequired === 'boolean' &&
  isOptionalString(value.validUntil);

const isIndexEntry = (value: unknown): value is IndexEntry => {
  if (!isRecord(value) || !isRecord(value.document) || !isNumberArray(value.vector)) return false;
  const { document } = value;
  return (
    typeof document.id === 'string' &&
    typeof document.text === 'string' &&
    isDocumentMetadata(document.metadata) &&
    isCardRecord(document.card)
  );
};

const toPersistedIndex = (value: unknown): PersistedIndex | null => {
  if (!isRecord(value)) return null;
  const record = value;
  if (
    typeof record.id !== 'string' ||
    typeof record.builtAt !== 'string' ||
    typeof record.sourceVersionId !== 'string' ||
    typeof record.embedderId !== 'string' ||
    typeof record.dimensions !== 'number' ||
    !Array.isArray(record.entries) ||
    !record.entries.every(isIndexEntry)
  ) {
    return null;
  }
  return {
    id: record.id,
    builtAt: record.builtAt,
    sourceVersionId: record.sourceVersionId,
    embedderId: record.embedderId,
    dimensions: record.dimensions,
    entries: record.entries
  };
};

const byScoreThenName = (a: ScoredDocument, b: ScoredDocument) =>
  b.score - a.score || (a.document.id < b.document.id ? -1 : a.document.id > b.document.id ? 1 : 0);

export class KnowledgeIndex {
  private readonly indexDir: string;
  private readonly embedder: Embedder;
  private readonly maxQueryK: number;
  private readonly now: () => Date;

  constructor(options: KnowledgeIndexOptions) {
    this.indexDir = options.indexDir;
    this.embedder = options.embedder;
    this.maxQueryK = options.maxQueryK ?? DEFAULT_MAX_QUERY_K;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Embeds every document and persists the result. Anything short of a
   * complete, non-empty index is an IndexBuildError; no handle is returned.
   */
  async build(documents: IndexDocument[], sourceVersionId = 'unversioned'): Promise<IndexHandle> {
    if (documents.length === 0) {
      throw new IndexBuildError('Cannot build an index from an empty catalog');
    }
    const ids = new Set(documents.map((document) => document.id));
    if (ids.size !== documents.length) {
      throw new IndexBuildError('Catalog documents must have unique card names');
    }

    let vectors: number[][];
    try {
      vectors = await this.embedder.embedDocuments(documents.map((document) => document.text));
    } catch (error) {
      throw new IndexBuildError(`Embedding failed: ${describeError(error)}`, { cause: error });
    }

    const dimensions = vectors[0]?.length ?? 0;
    if (vectors.length !== documents.length) {
      throw new IndexBuildError(
        `Embedder returned ${vectors.length} vector(s) for ${documents.length} document(s)`
      );
    }
    if (dimensions === 0 || vectors.some((vector) => vector.length !== dimensions)) {
      throw new IndexBuildError('Embedder returned empty or inconsistent vectors');
    }

    const builtAt = this.now();
    const persisted: PersistedIndex = {
      id: `${formatVersionStamp(builtAt)}-${uuidv4().slice(0, 8)}`,
      builtAt: builtAt.toISOString(),
      sourceVersionId,
      embedderId: this.embedder.id,
      dimensions,
      entries: documents.map((document, index) => ({ document, vector: vectors[index] }))
    };
    const filePath = path.join(this.indexDir, `index-${persisted.id}.json`);

    const temp = `${filePath}.${uuidv4()}.tmp`;
    try {
      await fs.mkdir(this.indexDir, { recursive: true });
      await fs.writeFile(temp, JSON.stringify(persisted));
      await fs.rename(temp, filePath);
    } catch (error) {
      await fs.rm(temp, { force: true });
      throw new IndexBuildError(`Failed to persist index ${persisted.id}`, { cause: error });
    }

    const handle = this.toHandle(persisted, filePath);
    logger.info(`[INDEX] Built ${handle.id} with ${handle.entries.length} document(s)`, {
      sourceVersionId,
      embedder: this.embedder.id
    });
    return handle;
  }

  /** Nearest neighbours by cosine similarity; ties fall back to card name order. */
  async query(handle: IndexHandle, text: string, k: number): Promise<ScoredDocument[]> {
    const limit = Math.max(1, Math.min(Math.floor(k), this.maxQueryK, handle.entries.length));
    const queryVector = await this.embedder.embedQuery(text);
    if (queryVector.length !== handle.dimensions) {
      throw new Error(
        `Query vector has ${queryVector.length} dimensions; index ${handle.id} has ${handle.dimensions}`
      );
    }
    return handle.entries
      .map((entry) => ({ document: entry.document, score: cosineSimilarity(queryVector, entry.vector) }))
      .sort(byScoreThenName)
      .slice(0, limit);
  }

  documentCount(handle: IndexHandle): number {
    return handle.entries.length;
  }

  findByName(handle: IndexHandle, name: string): IndexDocument | null {
    return handle.byName.get(name) ?? null;
  }

  cardNames(handle: IndexHandle): string[] {
    return Array.from(handle.byName.keys()).sort();
  }

  /**
   * Reopens the newest persisted index built from `sourceVersionId` by this
   * embedder, or returns null when there is none worth reusing.
   */
  async loadLatest(sourceVersionId: string): Promise<IndexHandle | null> {
    let files: string[];
    try {
      files = (await fs.readdir(this.indexDir)).filter((file) => FILE_PATTERN.test(file)).sort().reverse();
    } catch (error) {
      logger.debug(`[INDEX] No persisted index directory: ${describeError(error)}`);
      return null;
    }

    for (const file of files) {
      const filePath = path.join(this.indexDir, file);
      try {
        const persisted = toPersistedIndex(JSON.parse(await fs.readFile(filePath, 'utf-8')));
        if (!persisted) {
          logger.warn(`[INDEX] Ignoring unreadable index file ${file}`);
          continue;
        }
        if (
          persisted.sourceVersionId === sourceVersionId &&
          persisted.embedderId === this.embedder.id &&
          persisted.entries.length > 0
        ) {
          logger.info(`[INDEX] Reusing persisted index ${persisted.id}`);
          return this.toHandle(persisted, filePath);
        }
      } catch (error) {
        logger.warn(`[INDEX] Failed to load index file ${file}`, { error });
      }
    }
    return null;
  }

  /**
   * Deletes every persisted index file except the one backing `keep`,
   * including files left by earlier processes and interrupted builds.
   * In-memory readers of retired handles are unaffected.
   */
  async prune(keep: IndexHandle): Promise<string[]> {
    const keepFile = path.basename(keep.filePath);
    const stale = (await fs.readdir(this.indexDir)).filter(
      (file) => file !== keepFile && (FILE_PATTERN.test(file) || TEMP_PATTERN.test(file))
    );
    for (const file of stale) {
      await fs.rm(path.join(this.indexDir, file), { force: true });
    }
    if (stale.length > 0) {
      logger.info(`[INDEX] Pruned ${stale.length} stale index file(s); keeping ${keep.id}`);
    }
    return stale;
  }

  private toHandle(persisted: PersistedIndex, filePath: string): IndexHandle {
    const entries = Object.freeze(persisted.entries.map((entry) => Object.freeze({ ...entry })));
    return Object.freeze({
      id: persisted.id,
      builtAt: persisted.builtAt,
      sourceVersionId: persisted.sourceVersionId,
      embedderId: persisted.embedderId,
      dimensions: persisted.dimensions,
      filePath,
      entries,
      byName: new Map(entries.map((entry) => [entry.document.id, entry.document] as const))
    });
  }
}
