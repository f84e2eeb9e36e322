import fs from 'node:fs/promises';
import path from 'node:path';
import { createHash } from 'node:crypto';
import { v4 as uuidv4 } from 'uuid';
import logger from './logger';
import { isRecord } from './type-guards';
import { NotFoundError, VersionStoreError, describeError } from './errors';

export interface CatalogVersionMeta {
  id: string;
  filename: string;
  createdAt: string;
  sizeBytes: number;
  sha256: string;
}

export interface CatalogVersion extends CatalogVersionMeta {
  content: Buffer;
  source: 'store' | 'bundled';
}

interface Manifest {
  current: CatalogVersionMeta | null;
  /** oldest first */
  history: CatalogVersionMeta[];
}

export interface VersionStoreOptions {
  catalogDir: string;
  maxBackups?: number;
  bundledCatalogPath?: string | null;
  legacyCatalogPath?: string | null;
  now?: () => Date;
}

export const DEFAULT_MAX_BACKUPS = 30;
export const BUNDLED_VERSION_ID = 'bundled';

const FILE_PREFIX = 'catalog_';
const MANIFEST_FILE = 'manifest.json';

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

export const formatVersionStamp = (date: Date): string =>
  `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
  `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}_` +
  pad(date.getUTCMilliseconds(), 3);

const isVersionMeta = (value: unknown): value is CatalogVersionMeta =>
  isRecord(value) &&
  typeof value.id === 'string' &&
  typeof value.filename === 'string' &&
  typeof value.createdAt === 'string' &&
  typeof value.sizeBytes === 'number' &&
  typeof value.sha256 === 'string';

const isMissingFile = (error: unknown): boolean => error instanceof Error && Reflect.get(error, 'code') === 'ENOENT';

/**
 * Write to a sibling temp file and rename over the target, so a reader sees
 * either the old file or the complete new one.
 */
const writeAtomically = async (target: string, content: Buffer | string) => {
  const temp = path.join(path.dirname(target), `.${path.basename(target)}.${uuidv4()}.tmp`);
  try {
    await fs.writeFile(temp, content);
    await fs.rename(temp, target);
  } catch (error) {
    await fs.rm(temp, { force: true });
    throw error;
  }
};

/**
 * Owns the catalog files on disk: one current version plus a bounded,
 * insertion-ordered history of the versions it replaced. Bookkeeping lives in
 * a manifest, so reads never scan the directory.
 */
export class CatalogVersionStore {
  private readonly versionsDir: string;
  private readonly manifestPath: string;
  private readonly maxBackups: number;
  private readonly bundledCatalogPath: string | null;
  private readonly legacyCatalogPath: string | null;
  private readonly now: () => Date;
  private manifest: Manifest = { current: null, history: [] };
  private opening: Promise<void> | null = null;
  private pending: Promise<unknown> = Promise.resolve();

  constructor(options: VersionStoreOptions) {
    this.versionsDir = path.join(options.catalogDir, 'versions');
    this.manifestPath = path.join(options.catalogDir, MANIFEST_FILE);
    this.maxBackups = Math.max(0, options.maxBackups ?? DEFAULT_MAX_BACKUPS);
    this.bundledCatalogPath = options.bundledCatalogPath ?? null;
    this.legacyCatalogPath = options.legacyCatalogPath ?? null;
    this.now = options.now ?? (() => new Date());
  }

  open(): Promise<void> {
    if (!this.opening) {
      this.opening = this.openNow().catch((error: unknown) => {
        this.opening = null;
        throw error;
      });
    }
    return this.opening;
  }

  private async openNow(): Promise<void> {
    await fs.mkdir(this.versionsDir, { recursive: true });
    this.manifest = await this.readManifest();

    if (!this.manifest.current && this.legacyCatalogPath) {
      await this.migrateLegacyCatalog(this.legacyCatalogPath);
    }
    logger.info(
      `[VERSION-STORE] Ready: current=${this.manifest.current?.id ?? 'none'}, backups=${this.manifest.history.length}/${this.maxBackups}`
    );
  }

  /**
   * Makes `content` the current version. The version it replaces moves into
   * history; history beyond maxBackups is evicted oldest first.
   */
  promote(content: Buffer, createdAt?: Date): Promise<CatalogVersionMeta> {
    const run = this.pending.then(async () => {
      await this.open();
      return this.promoteNow(content, createdAt ?? this.now());
    });
    this.pending = run.catch(() => undefined);
    return run;
  }

  async getCurrent(): Promise<CatalogVersion> {
    await this.open();
    const current = this.manifest.current;
    if (current) {
      try {
        const content = await fs.readFile(this.versionPath(current.filename));
        return { ...current, content, source: 'store' };
      } catch (error) {
        if (!isMissingFile(error) || this.manifest.current?.id === current.id) {
          throw new VersionStoreError(`Unable to read catalog version ${current.id}`, { cause: error });
        }
        // Evicted between the manifest read and the file read; the newer current is intact.
        return this.getCurrent();
      }
    }
    return this.readBundledCatalog();
  }

  currentMeta(): CatalogVersionMeta | null {
    return this.manifest.current;
  }

  /** History newest first. */
  listVersions(): { current: CatalogVersionMeta | null; history: CatalogVersionMeta[] } {
    return { current: this.manifest.current, history: [...this.manifest.history].reverse() };
  }

  backupCount(): number {
    return this.manifest.history.length;
  }

  private versionPath(filename: string) {
    return path.join(this.versionsDir, filename);
  }

  private async promoteNow(content: Buffer, createdAt: Date): Promise<CatalogVersionMeta> {
    const meta = this.describeVersion(content, createdAt);

    try {
      await writeAtomically(this.versionPath(meta.filename), content);
    } catch (error) {
      throw new VersionStoreError(`Failed to write catalog version ${meta.id}`, { cause: error });
    }

    const previous = this.manifest.current;
    const history = previous ? [...this.manifest.history, previous] : [...this.manifest.history];
    const evicted = history.splice(0, Math.max(0, history.length - this.maxBackups));
    const next: Manifest = { current: meta, history };

    try {
      await writeAtomically(this.manifestPath, JSON.stringify(next, null, 2));
    } catch (error) {
      await fs.rm(this.versionPath(meta.filename), { force: true });
      throw new VersionStoreError(`Failed to record catalog version ${meta.id}`, { cause: error });
    }
    this.manifest = next;
    logger.info(`[VERSION-STORE] Promoted ${meta.filename}`, {
      previous: previous?.id ?? null,
      backups: history.length
    });

    await this.evict(evicted);
    return meta;
  }

  private describeVersion(content: Buffer, createdAt: Date): CatalogVersionMeta {
    const stamp = formatVersionStamp(createdAt);
    const taken = new Set(
      [this.manifest.current, ...this.manifest.history]
        .filter((entry): entry is CatalogVersionMeta => entry !== null)
        .map((entry) => entry.id)
    );
    let id = stamp;
    for (let suffix = 1; taken.has(id); suffix += 1) {
      id = `${stamp}-${suffix}`;
    }
    return {
      id,
      filename: `${FILE_PREFIX}${id}.csv`,
      createdAt: createdAt.toISOString(),
      sizeBytes: content.length,
      sha256: createHash('sha256').update(content).digest('hex')
    };
  }

  private async evict(entries: CatalogVersionMeta[]) {
    for (const entry of entries) {
      try {
        await fs.rm(this.versionPath(entry.filename), { force: true });
        logger.info(`[VERSION-STORE] Evicted backup ${entry.filename}`);
      } catch (error) {
        logger.warn(`[VERSION-STORE] Failed to delete evicted backup ${entry.filename}`, { error });
      }
    }
  }

  private async readManifest(): Promise<Manifest> {
    let raw: string;
    try {
      raw = await fs.readFile(this.manifestPath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return { current: null, history: [] };
      }
      throw new VersionStoreError('Unable to read the catalog manifest', { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new VersionStoreError('The catalog manifest is not valid JSON', { cause: error });
    }
    const record = isRecord(parsed) ? parsed : {};
    const current = isVersionMeta(record.current) ? record.current : null;
    const history = Array.isArray(record.history) ? record.history.filter(isVersionMeta) : [];

    const present = async (entry: CatalogVersionMeta) => {
      try {
        await fs.access(this.versionPath(entry.filename));
        return true;
      } catch {
        logger.warn(`[VERSION-STORE] Dropping ${entry.filename} from the manifest; file is missing`);
        return false;
      }
    };
    const keptHistory: CatalogVersionMeta[] = [];
    for (const entry of history) {
      if (await present(entry)) {
        keptHistory.push(entry);
      }
    }
    return {
      current: current && (await present(current)) ? current : null,
      history: keptHistory
    };
  }

  private async migrateLegacyCatalog(legacyPath: string) {
    const stats = await fs.stat(legacyPath).catch((error: unknown) => {
      if (isMissingFile(error)) {
        return null;
      }
      throw new VersionStoreError(`Unable to inspect legacy catalog ${legacyPath}`, { cause: error });
    });
    if (!stats) {
      return;
    }
    const content = await fs.readFile(legacyPath);
    const meta = await this.promoteNow(content, stats.mtime);
    await fs.rm(legacyPath, { force: true });
    logger.info(`[VERSION-STORE] Migrated ${path.basename(legacyPath)} -> ${meta.filename}`);
  }

  private async readBundledCatalog(): Promise<CatalogVersion> {
    if (this.bundledCatalogPath) {
      try {
        const [content, stats] = await Promise.all([
          fs.readFile(this.bundledCatalogPath),
          fs.stat(this.bundledCatalogPath)
        ]);
        return {
          id: BUNDLED_VERSION_ID,
          filename: path.basename(this.bundledCatalogPath),
          createdAt: stats.mtime.toISOString(),
          sizeBytes: content.length,
          sha256: createHash('sha256').update(content).digest('hex'),
          content,
          source: 'bundled'
        };
      } catch (error) {
        if (!isMissingFile(error)) {
          throw new VersionStoreError(`Unable to read bundled catalog: ${describeError(error)}`, {
            cause: error
          });
        }
      }
    }
    throw new NotFoundError('No card catalog has been published yet.');
  }
}
