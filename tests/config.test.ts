import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { MIN_CANDIDATE_POOL, loadSettings } from '../src/config/settings';
import { isAdminKeyValid } from '../src/admin-auth';
import {
  GenerationUnavailableError,
  MalformedCatalogError,
  RefreshInProgressError,
  toPublicError
} from '../src/errors';

describe('loadSettings', () => {
  it('applies defaults', () => {
    const settings = loadSettings({});

    expect(settings.port).toBe(8000);
    expect(settings.maxBackups).toBe(30);
    expect(settings.catalogDir).toBe(path.resolve(process.cwd(), 'storage/catalog'));
    expect(settings.remote.kind).toBe('none');
    expect(settings.openai.apiKey).toBeNull();
    expect(settings.candidatePoolSize).toBe(MIN_CANDIDATE_POOL);
    expect(settings.categoryTablePath).toBeNull();
  });

  it('resolves a custom category table path', () => {
    const settings = loadSettings({ CATEGORY_KEYWORDS_PATH: 'config/categories.json' });

    expect(settings.categoryTablePath).toBe(path.resolve(process.cwd(), 'config/categories.json'));
  });

  it('reads the legacy variable names as fallbacks', () => {
    const settings = loadSettings({ DATA_DIR: 'legacy-data', CREDIT_CARD_CSV_PATH: 'cards.csv' });

    expect(settings.catalogDir).toBe(path.resolve(process.cwd(), 'legacy-data'));
    expect(settings.bundledCatalogPath).toBe(path.resolve(process.cwd(), 'cards.csv'));
  });

  it('ignores invalid numbers and keeps the candidate pool at its minimum', () => {
    const settings = loadSettings({ MAX_BACKUPS: 'many', CANDIDATE_POOL_SIZE: '3', PORT: '9090' });

    expect(settings.maxBackups).toBe(30);
    expect(settings.candidatePoolSize).toBe(MIN_CANDIDATE_POOL);
    expect(settings.port).toBe(9090);
  });
});

describe('isAdminKeyValid', () => {
  it('accepts only the configured key', () => {
    const config = { adminApiKey: 'test-secret', debug: false };

    expect(isAdminKeyValid(config, 'test-secret')).toBe(true);
    expect(isAdminKeyValid(config, 'test-secret2')).toBe(false);
    expect(isAdminKeyValid(config, null)).toBe(false);
  });

  it('is open without a key only in debug mode', () => {
    expect(isAdminKeyValid({ adminApiKey: null, debug: true }, null)).toBe(true);
    expect(isAdminKeyValid({ adminApiKey: null, debug: false }, 'anything')).toBe(false);
  });
});

describe('toPublicError', () => {
  it('maps known failures to status codes', () => {
    expect(toPublicError(new MalformedCatalogError(4, 'rate', 'bad rate'))).toEqual({
      status: 422,
      code: 'MALFORMED_CATALOG',
      message: 'Catalog row 4 (rate): bad rate'
    });
    expect(toPublicError(new RefreshInProgressError('run-1')).status).toBe(409);
    expect(toPublicError(new GenerationUnavailableError('timeout', 'slow')).status).toBe(503);
  });

  it('hides the details of unexpected errors', () => {
    expect(toPublicError(new Error('ECONNRESET at 10.0.0.1'))).toEqual({
      status: 500,
      code: 'INTERNAL',
      message: 'Something went wrong while handling the request. Please try again later.'
    });
  });
});
