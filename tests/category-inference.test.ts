import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import {
  DEFAULT_CATEGORY_TABLE_PATH,
  canonicalCategory,
  inferCategory,
  loadCategoryTable,
  parseCategoryTable,
  useCategoryTableFile
} from '../src/category-inference';
import { makeTempDir, removeDir } from './helpers';

describe('inferCategory', () => {
  const table = loadCategoryTable();

  it('maps a keyword in the question to its category', () => {
    expect(inferCategory('need gas', [], table)).toBe('fuel');
    expect(inferCategory('Dinner with friends tonight', [], table)).toBe('dining');
  });

  it('matches plurals and aliases', () => {
    expect(inferCategory('best card for restaurants', [], table)).toBe('dining');
    expect(inferCategory('booking flights', [], table)).toBe('travel');
    expect(inferCategory('two hotels', [], table)).toBe('travel');
    expect(inferCategory('my subscriptions', [], table)).toBe('streaming');
    expect(inferCategory('taking buses to work', [], table)).toBe('transport');
    expect(inferCategory('corner convenience shop', [], table)).toBe('convenience');
  });

  it('matches latin keywords only as whole words', () => {
    expect(inferCategory('trip to las vegas', [], table)).toBe('travel');
  });

  it('matches keywords inside Chinese text', () => {
    expect(inferCategory('今晚想吃飯', [], table)).toBe('dining');
    expect(inferCategory('週末要加油', [], table)).toBe('fuel');
  });

  it('falls back to the catalog categories, longest first', () => {
    expect(inferCategory('pet supplies for the weekend', ['pet', 'pet supplies'], table)).toBe('pet supplies');
  });

  it('returns null when nothing matches', () => {
    expect(inferCategory('hello there', ['fuel'], table)).toBeNull();
  });
});

describe('canonicalCategory', () => {
  it('files aliases under the canonical id', () => {
    expect(canonicalCategory('Gas')).toBe('fuel');
    expect(canonicalCategory('  Online Shopping ')).toBe('online');
  });

  it('keeps unknown labels, normalized', () => {
    expect(canonicalCategory('Pet  Supplies')).toBe('pet supplies');
  });
});

describe('parseCategoryTable', () => {
  it('rejects a file without a categories array', () => {
    expect(() => parseCategoryTable('{"items": []}')).toThrow(
      'category-keywords.json does not contain a categories array'
    );
  });

  it('lower-cases keywords and normalizes aliases', () => {
    const [definition] = parseCategoryTable(
      JSON.stringify({ categories: [{ id: 'pets', aliases: ['Pet  Store'], keywords: ['Vet'] }] })
    );
    expect(definition).toEqual({ id: 'pets', aliases: ['pet store'], keywords: ['vet'] });
  });
});

describe('category table file', () => {
  let dir: string | null = null;

  afterEach(async () => {
    useCategoryTableFile();
    if (dir) {
      await removeDir(dir);
      dir = null;
    }
  });

  it('resolves the bundled table beside the sources, not the working directory', () => {
    expect(DEFAULT_CATEGORY_TABLE_PATH).toBe(path.resolve(__dirname, '..', 'data', 'category-keywords.json'));
  });

  it('reads a configured table file', async () => {
    dir = await makeTempDir('categories');
    const filePath = path.join(dir, 'categories.json');
    await fs.writeFile(
      filePath,
      JSON.stringify({ categories: [{ id: 'pets', aliases: ['pet store'], keywords: ['vet'] }] })
    );

    useCategoryTableFile(filePath);

    expect(loadCategoryTable()).toEqual([{ id: 'pets', aliases: ['pet store'], keywords: ['vet'] }]);
    expect(inferCategory('visiting the vets')).toBe('pets');
  });
});
