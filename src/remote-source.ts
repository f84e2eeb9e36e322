import AWS from 'aws-sdk';
import logger from './logger';
import { RemoteFetchError, describeError } from './errors';
import type { Settings } from './config/settings';

export type FetchOutcome =
  | { status: 'fetched'; content: Buffer; source: string }
  | { status: 'unavailable'; error: RemoteFetchError };

/** Where fresh catalogs come from. Never throws; failure is an `unavailable` outcome. */
export interface CatalogSource {
  readonly name: string;
  fetchLatestFile(): Promise<FetchOutcome>;
}

export interface S3ObjectReader {
  getObject(params: { Bucket: string; Key: string }): {
    promise(): Promise<{ Body?: AWS.S3.Body }>;
  };
}

const unavailable = (source: string, message: string, cause?: unknown): FetchOutcome => {
  const error = new RemoteFetchError(source, message, { cause });
  logger.warn(`[REMOTE] ${error.message}`);
  return { status: 'unavailable', error };
};

const toBuffer = (body: AWS.S3.Body | undefined): Buffer | null => {
  if (Buffer.isBuffer(body)) return body;
  if (typeof body === 'string') return Buffer.from(body, 'utf-8');
  if (body instanceof Uint8Array) return Buffer.from(body);
  return null;
};

export class S3CatalogSource implements CatalogSource {
  readonly name: string;

  constructor(
    private readonly s3: S3ObjectReader,
    private readonly bucket: string,
    private readonly key: string
  ) {
    this.name = `s3://${bucket}/${key}`;
  }

  async fetchLatestFile(): Promise<FetchOutcome> {
    try {
      const response = await this.s3.getObject({ Bucket: this.bucket, Key: this.key }).promise();
      const content = toBuffer(response.Body);
      if (!content || content.length === 0) {
        return unavailable(this.name, 'object is empty or unreadable');
      }
      logger.info(`[REMOTE] Downloaded ${content.length} bytes from ${this.name}`);
      return { status: 'fetched', content, source: this.name };
    } catch (error) {
      return unavailable(this.name, describeError(error), error);
    }
  }
}

type FetchLike = (url: string, init: { signal: AbortSignal }) => Promise<{
  ok: boolean;
  status: number;
  arrayBuffer(): Promise<ArrayBuffer>;
}>;

/**
 * Pulls an id out of a Google Drive or Sheets share link; a bare id is
 * returned unchanged.
 */
export const extractDriveFileId = (value: string): string | null => {
  const patterns = [/\/file\/d\/([a-zA-Z0-9_-]+)/, /[?&]id=([a-zA-Z0-9_-]+)/, /\/d\/([a-zA-Z0-9_-]+)/];
  for (const pattern of patterns) {
    const match = value.match(pattern);
    if (match) {
      return match[1];
    }
  }
  return /^[a-zA-Z0-9_-]+$/.test(value.trim()) ? value.trim() : null;
};

/**
 * Tries the Sheets CSV export first, then the plain Drive download, the way a
 * shared spreadsheet or an uploaded CSV file is published.
 */
export class SheetsCatalogSource implements CatalogSource {
  readonly name: string;
  private readonly fileId: string;

  constructor(
    fileIdOrUrl: string,
    private readonly timeoutMs: number,
    private readonly fetchImpl: FetchLike = fetch
  ) {
    this.fileId = extractDriveFileId(fileIdOrUrl) ?? fileIdOrUrl;
    this.name = `drive:${this.fileId}`;
  }

  async fetchLatestFile(): Promise<FetchOutcome> {
    const urls = [
      `https://docs.google.com/spreadsheets/d/${this.fileId}/export?format=csv`,
      `https://drive.google.com/uc?export=download&id=${this.fileId}`
    ];
    let lastProblem = 'no download attempted';
    let lastError: unknown;
    for (const url of urls) {
      try {
        const response = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.timeoutMs) });
        if (!response.ok) {
          lastProblem = `HTTP ${response.status} from ${url}`;
          continue;
        }
        const content = Buffer.from(await response.arrayBuffer());
        if (content.length === 0) {
          lastProblem = `empty download from ${url}`;
          continue;
        }
        logger.info(`[REMOTE] Downloaded ${content.length} bytes from ${url}`);
        return { status: 'fetched', content, source: this.name };
      } catch (error) {
        lastError = error;
        lastProblem = describeError(error);
      }
    }
    return unavailable(this.name, lastProblem, lastError);
  }
}

export const createCatalogSource = (settings: Settings): CatalogSource | null => {
  const { remote } = settings;
  if (remote.kind === 's3') {
    if (!remote.s3Bucket || !remote.s3Key) {
      logger.warn('[REMOTE] CATALOG_SOURCE=s3 needs CATALOG_S3_BUCKET and CATALOG_S3_KEY; remote refresh disabled');
      return null;
    }
    const s3 = new AWS.S3({
      region: settings.awsRegion,
      httpOptions: { timeout: remote.timeoutMs, connectTimeout: remote.timeoutMs }
    });
    return new S3CatalogSource(s3, remote.s3Bucket, remote.s3Key);
  }
  if (remote.kind === 'sheets') {
    if (!remote.driveFileId) {
      logger.warn('[REMOTE] CATALOG_SOURCE=sheets needs GOOGLE_DRIVE_FILE_ID; remote refresh disabled');
      return null;
    }
    return new SheetsCatalogSource(remote.driveFileId, remote.timeoutMs);
  }
  return null;
};
