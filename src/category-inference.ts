import fs from 'node:fs';
import path from 'node:path';
import { isRecord, isStringArray } from './type-guards';

export interface CategoryDefinition {
  id: string;
  aliases: string[];
  keywords: string[];
}

export const DEFAULT_CATEGORY_TABLE_PATH = path.resolve(__dirname, '..', 'data', 'category-keywords.json');

let tablePath = DEFAULT_CATEGORY_TABLE_PATH;
let cachedTable: CategoryDefinition[] | null = null;

const toDefinition = (value: unknown, index: number): CategoryDefinition => {
  if (!isRecord(value)) {
    throw new Error(`category-keywords.json entry ${index} is not an object`);
  }
  const { id, aliases, keywords } = value;
  if (typeof id !== 'string' || !isStringArray(aliases) || !isStringArray(keywords)) {
    throw new Error(`category-keywords.json entry ${index} needs id, aliases and keywords`);
  }
  return {
    id,
    aliases: aliases.map((alias) => normalizeCategoryName(alias)),
    keywords: keywords.map((keyword) => keyword.toLowerCase())
  };
};

export const parseCategoryTable = (raw: string): CategoryDefinition[] => {
  const parsed: unknown = JSON.parse(raw);
  const categories = isRecord(parsed) ? parsed.categories : undefined;
  if (!Array.isArray(categories)) {
    throw new Error('category-keywords.json does not contain a categories array');
  }
  return categories.map(toDefinition);
};

/** Points the shared table at another file; it is read again on next use. */
export const useCategoryTableFile = (filePath: string = DEFAULT_CATEGORY_TABLE_PATH): void => {
  tablePath = filePath;
  cachedTable = null;
};

export const loadCategoryTable = (): CategoryDefinition[] => {
  if (!cachedTable) {
    cachedTable = parseCategoryTable(fs.readFileSync(tablePath, 'utf-8'));
  }
  return cachedTable;
};

export const normalizeCategoryName = (value: string): string =>
  value.trim().toLowerCase().replace(/\s+/g, ' ');

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

// Latin keywords match whole words with an optional plural ("hotels", not "vegas"); CJK has no word breaks.
const containsKeyword = (text: string, keyword: string): boolean => {
  if (/^[\x20-\x7e]+$/.test(keyword)) {
    const plural = /[a-z]$/.test(keyword) ? '(?:e?s)?' : '';
    return new RegExp(`(^|[^a-z0-9])${escapeRegExp(keyword)}${plural}($|[^a-z0-9])`).test(text);
  }
  return text.includes(keyword);
};

const termsOf = (definition: CategoryDefinition): string[] =>
  Array.from(new Set([...definition.keywords, ...definition.aliases]));

/**
 * Maps a catalog category label onto the canonical id from the keyword table,
 * so "Fuel", "gas" and "加油" all file under "fuel". Labels the table does not
 * know are kept as-is (lower-cased), categories are an open set.
 */
export const canonicalCategory = (
  raw: string,
  table: CategoryDefinition[] = loadCategoryTable()
): string => {
  const normalized = normalizeCategoryName(raw);
  const match = table.find(
    (definition) =>
      definition.id === normalized ||
      definition.aliases.includes(normalized) ||
      definition.keywords.includes(normalized)
  );
  return match ? match.id : normalized;
};

/**
 * Picks the spending category a query is about. The keyword table (keywords
 * and aliases) is checked first, in file order; then the catalog's own category names, longest first.
 * Returns null when nothing matches.
 */
export const inferCategory = (
  query: string,
  knownCategories: Iterable<string> = [],
  table: CategoryDefinition[] = loadCategoryTable()
): string | null => {
  const text = query.toLowerCase();
  for (const definition of table) {
    if (termsOf(definition).some((term) => containsKeyword(text, term))) {
      return definition.id;
    }
  }

  const candidates = Array.from(new Set(Array.from(knownCategories, normalizeCategoryName)))
    .filter(Boolean)
    .sort((a, b) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0));
  return candidates.find((category) => containsKeyword(text, category)) ?? null;
};
