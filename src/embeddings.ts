import OpenAI from 'openai';
import logger from './logger';

export interface Embedder {
  /** Identifies model and dimensions; a persisted index is only reused by the same embedder. */
  readonly id: string;
  embedDocuments(texts: string[]): Promise<number[][]>;
  embedQuery(text: string): Promise<number[]>;
}

const dot = (a: number[], b: number[]): number => a.reduce((sum, value, i) => sum + value * b[i], 0);

export const vectorNorm = (vector: number[]): number => Math.sqrt(dot(vector, vector));

/** 0 when either side is the zero vector. */
export const cosineSimilarity = (a: number[], b: number[]): number => {
  if (a.length !== b.length) {
    throw new Error(`Cannot compare vectors of ${a.length} and ${b.length} dimensions`);
  }
  const scale = vectorNorm(a) * vectorNorm(b);
  return scale === 0 ? 0 : dot(a, b) / scale;
};

const CJK_RUN = /[\u3400-\u9fff\uf900-\ufaff]+/g;
const LATIN_TOKEN = /[a-z0-9]+(?:\.[0-9]+)?%?/g;

export const tokenize = (text: string): string[] => {
  const lower = text.toLowerCase();
  const tokens: string[] = [...(lower.match(LATIN_TOKEN) ?? [])];
  for (const run of lower.match(CJK_RUN) ?? []) {
    const chars = Array.from(run);
    tokens.push(...chars);
    for (let i = 0; i < chars.length - 1; i++) {
      tokens.push(chars[i] + chars[i + 1]);
    }
  }
  return tokens;
};

const fnv1a = (value: string): number => {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
};

/**
 * Deterministic bag-of-words feature hashing. Needs no network, so it backs
 * local runs without an API key and keeps similarity scores stable in tests.
 */
export class HashingEmbedder implements Embedder {
  readonly id: string;

  constructor(private readonly dimensions = 256) {
    this.id = `hashing-${dimensions}`;
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embed(text));
  }

  async embedQuery(text: string): Promise<number[]> {
    return this.embed(text);
  }

  private embed(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(text)) {
      const hash = fnv1a(token);
      vector[hash % this.dimensions] += hash & 0x80000000 ? -1 : 1;
    }
    const norm = vectorNorm(vector);
    return norm === 0 ? vector : vector.map((value) => value / norm);
  }
}

export interface OpenAIEmbedderOptions {
  client: OpenAI;
  model: string;
  timeoutMs: number;
  batchSize?: number;
}

export class OpenAIEmbedder implements Embedder {
  readonly id: string;
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly batchSize: number;

  constructor(options: OpenAIEmbedderOptions) {
    this.client = options.client;
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
    this.batchSize = options.batchSize ?? 96;
    this.id = `openai:${options.model}`;
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      vectors.push(...(await this.request(batch)));
      logger.debug(`[INDEX] Embedded ${Math.min(i + batch.length, texts.length)}/${texts.length} document(s)`);
    }
    return vectors;
  }

  async embedQuery(text: string): Promise<number[]> {
    const [vector] = await this.request([text]);
    return vector;
  }

  private async request(input: string[]): Promise<number[][]> {
    const response = await this.client.embeddings.create(
      { model: this.model, input },
      { timeout: this.timeoutMs, maxRetries: 0 }
    );
    return [...response.data].sort((a, b) => a.index - b.index).map((entry) => entry.embedding);
  }
}
