import path from 'node:path';
import logger from '../logger';

type Env = Record<string, string | undefined>;

export type RemoteSourceKind = 'none' | 's3' | 'sheets';

export interface Settings {
  port: number;
  debug: boolean;
  adminApiKey: string | null;
  catalogDir: string;
  indexDir: string;
  maxBackups: number;
  bundledCatalogPath: string | null;
  legacyCatalogPath: string | null;
  categoryTablePath: string | null;
  refreshRemoteOnStart: boolean;
  remote: {
    kind: RemoteSourceKind;
    s3Bucket: string | null;
    s3Key: string | null;
    driveFileId: string | null;
    timeoutMs: number;
  };
  openai: {
    apiKey: string | null;
    chatModel: string;
    embeddingModel: string;
    timeoutMs: number;
  };
  candidatePoolSize: number;
  heldCardsTable: string | null;
  awsRegion: string;
}

export const MIN_CANDIDATE_POOL = 10;

const selectFirstValue = (...candidates: Array<string | undefined | null>): string | null => {
  for (const candidate of candidates) {
    if (typeof candidate === 'string') {
      const trimmed = candidate.trim();
      if (trimmed.length > 0) {
        return trimmed;
      }
    }
  }
  return null;
};

const resolvePath = (fallback: string, ...candidates: Array<string | undefined>): string =>
  path.resolve(process.cwd(), selectFirstValue(...candidates) ?? fallback);

const resolveOptionalPath = (...candidates: Array<string | undefined>): string | null => {
  const provided = selectFirstValue(...candidates);
  return provided ? path.resolve(process.cwd(), provided) : null;
};

const parseInteger = (name: string, raw: string | undefined, fallback: number, min = 0): number => {
  const provided = selectFirstValue(raw);
  if (!provided) {
    return fallback;
  }
  const parsed = Number(provided);
  if (!Number.isInteger(parsed) || parsed < min) {
    logger.warn(`[CONFIG] Ignoring invalid ${name}=${provided}; using ${fallback}`);
    return fallback;
  }
  return parsed;
};

const parseFlag = (raw: string | undefined, fallback: boolean): boolean => {
  const provided = selectFirstValue(raw);
  if (!provided) {
    return fallback;
  }
  return ['true', '1', 'yes', 'on'].includes(provided.toLowerCase());
};

const parseRemoteKind = (raw: string | undefined): RemoteSourceKind => {
  const provided = (selectFirstValue(raw) ?? 'none').toLowerCase();
  if (provided === 's3' || provided === 'sheets' || provided === 'none') {
    return provided;
  }
  logger.warn(`[CONFIG] Unknown CATALOG_SOURCE=${provided}; remote refresh disabled`);
  return 'none';
};

export const loadSettings = (env: Env = process.env): Settings => ({
  port: parseInteger('PORT', env.PORT, 8000, 1),
  debug: parseFlag(env.DEBUG, false),
  adminApiKey: selectFirstValue(env.ADMIN_API_KEY),
  catalogDir: resolvePath('storage/catalog', env.CATALOG_DIR, env.DATA_DIR),
  indexDir: resolvePath('storage/index', env.INDEX_DIR, env.CHROMA_PERSIST_DIRECTORY),
  maxBackups: parseInteger('MAX_BACKUPS', env.MAX_BACKUPS, 30),
  bundledCatalogPath: resolveOptionalPath(
    env.BUNDLED_CATALOG_PATH,
    env.CREDIT_CARD_CSV_PATH,
    'data/catalog.sample.csv'
  ),
  legacyCatalogPath: resolveOptionalPath(env.LEGACY_CATALOG_PATH),
  categoryTablePath: resolveOptionalPath(env.CATEGORY_KEYWORDS_PATH),
  refreshRemoteOnStart: parseFlag(env.REFRESH_REMOTE_ON_START, false),
  remote: {
    kind: parseRemoteKind(env.CATALOG_SOURCE),
    s3Bucket: selectFirstValue(env.CATALOG_S3_BUCKET),
    s3Key: selectFirstValue(env.CATALOG_S3_KEY),
    driveFileId: selectFirstValue(env.GOOGLE_DRIVE_FILE_ID),
    timeoutMs: parseInteger('REMOTE_FETCH_TIMEOUT_MS', env.REMOTE_FETCH_TIMEOUT_MS, 15000, 1)
  },
  openai: {
    apiKey: selectFirstValue(env.OPENAI_API_KEY),
    chatModel: selectFirstValue(env.CHAT_MODEL) ?? 'gpt-4o-mini',
    embeddingModel: selectFirstValue(env.EMBEDDING_MODEL) ?? 'text-embedding-3-small',
    timeoutMs: parseInteger('GENERATION_TIMEOUT_MS', env.GENERATION_TIMEOUT_MS, 20000, 1)
  },
  candidatePoolSize: parseInteger(
    'CANDIDATE_POOL_SIZE',
    env.CANDIDATE_POOL_SIZE,
    MIN_CANDIDATE_POOL,
    MIN_CANDIDATE_POOL
  ),
  heldCardsTable: selectFirstValue(env.HELD_CARDS_TABLE),
  awsRegion: selectFirstValue(env.AWS_REGION) ?? 'us-east-1'
});
