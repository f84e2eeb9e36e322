import { Readable } from 'node:stream';
import csv from 'csv-parser';
import logger from './logger';
import { MalformedCatalogError } from './errors';
import { canonicalCategory } from './category-inference';

export interface CardRecord {
  name: string;
  bank: string | null;
  /** category id -> reward rate in percent */
  rewards: Record<string, number>;
  activationRequired: boolean;
  validFrom: string | null;
  validUntil: string | null;
  annualFee: number | null;
  conditions: string;
}

export interface IndexDocumentMetadata {
  categories: string[];
  activationRequired: boolean;
  validUntil: string | null;
}

export interface IndexDocument {
  id: string;
  text: string;
  metadata: IndexDocumentMetadata;
  card: CardRecord;
}

const COLUMN_KEYS = [
  'name',
  'category',
  'rate',
  'activation',
  'validUntil',
  'validFrom',
  'conditions',
  'bank',
  'annualFee'
] as const;

type ColumnKey = (typeof COLUMN_KEYS)[number];

const COLUMN_ALIASES: Record<ColumnKey, string[]> = {
  name: ['card_name', 'card', 'name', '信用卡名稱'],
  category: ['category', 'reward_category', '消費類別'],
  rate: ['rate', 'reward_rate', '回饋率'],
  activation: ['activation_required', 'requires_activation', 'app_switch', '需切換'],
  validUntil: ['valid_until', 'expiry', 'end_date', '回饋到期日'],
  validFrom: ['valid_from', 'start_date', '回饋開始日'],
  conditions: ['conditions', 'notes', '備註'],
  bank: ['bank', 'issuer', '銀行'],
  annualFee: ['annual_fee', '年費']
};

const REQUIRED_COLUMNS: ColumnKey[] = ['name', 'category', 'rate', 'activation'];

const TRUE_FLAGS = ['yes', 'y', 'true', '1', 'required', '需要', '是'];
const FALSE_FLAGS = ['', 'no', 'n', 'false', '0', 'none', 'not required', '不需要', '無需切換', '否'];
const OPEN_ENDED_DATES = ['', 'ongoing', 'none', 'n/a', '長期'];

// The header occupies line 1, so the first data record is row 2.
const FIRST_DATA_ROW = 2;

type RawRow = Record<string, string>;

const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf]);

const stripBom = (raw: Buffer | string): Buffer => {
  const buffer = typeof raw === 'string' ? Buffer.from(raw, 'utf-8') : raw;
  return buffer.subarray(0, 3).equals(UTF8_BOM) ? buffer.subarray(3) : buffer;
};

export const normalizeHeader = (header: string): string =>
  header
    .replace(/^\uFEFF/, '')
    .trim()
    .toLowerCase()
    .replace(/[\s-]+/g, '_');

const toRawRow = (value: unknown): RawRow => {
  const row: RawRow = {};
  if (typeof value === 'object' && value !== null) {
    Object.entries(value).forEach(([key, cell]) => {
      row[key] = typeof cell === 'string' ? cell.trim() : '';
    });
  }
  return row;
};

const resolveColumns = (headers: string[]): Partial<Record<ColumnKey, string>> => {
  const columns: Partial<Record<ColumnKey, string>> = {};
  COLUMN_KEYS.forEach((key) => {
    const header = COLUMN_ALIASES[key].find((alias) => headers.includes(alias));
    if (header) {
      columns[key] = header;
    }
  });
  const missing = REQUIRED_COLUMNS.find((key) => !columns[key]);
  if (missing) {
    throw new MalformedCatalogError(1, COLUMN_ALIASES[missing][0], 'required column is missing');
  }
  return columns;
};

const readRows = async (raw: Buffer | string): Promise<{ headers: string[]; rows: RawRow[] }> => {
  let headers: string[] = [];
  const parser = csv({ mapHeaders: ({ header }) => normalizeHeader(header) });
  parser.on('headers', (parsed: string[]) => {
    headers = parsed;
  });
  const rows: RawRow[] = [];
  for await (const record of Readable.from([stripBom(raw)]).pipe(parser)) {
    rows.push(toRawRow(record));
  }
  return { headers, rows };
};

export const parseRate = (value: string): number | null => {
  const match = value.replace(/\s+/g, '').match(/^(-?\d+(?:\.\d+)?)%?$/);
  return match ? Number(match[1]) : null;
};

export const parseFlag = (value: string): boolean | null => {
  const normalized = value.trim().toLowerCase();
  if (TRUE_FLAGS.includes(normalized)) return true;
  if (FALSE_FLAGS.includes(normalized)) return false;
  return null;
};

/** Returns undefined for an open-ended value, null when the text is not a date. */
export const parseCatalogDate = (value: string): string | null | undefined => {
  const normalized = value.trim().toLowerCase();
  if (OPEN_ENDED_DATES.includes(normalized)) {
    return undefined;
  }
  const match = normalized.match(/^(\d{4})[-/](\d{1,2})[-/](\d{1,2})$/);
  if (!match) {
    return null;
  }
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date.toISOString().slice(0, 10);
};

const parseAnnualFee = (value: string): number | null => {
  const digits = value.replace(/[,\s]/g, '').match(/^\d+(?:\.\d+)?/);
  return digits ? Number(digits[0]) : null;
};

const earliest = (a: string | null, b: string | null): string | null => {
  if (!a) return b;
  if (!b) return a;
  return a < b ? a : b;
};

const cell = (row: RawRow, column: string | undefined): string => (column ? row[column] ?? '' : '');

/**
 * Parses a tabular catalog into card records. Columns are found by header name
 * in any order; a card with rewards in several categories spans several rows.
 * Throws MalformedCatalogError for the first row that cannot be used.
 */
export const parseCatalog = async (raw: Buffer | string): Promise<CardRecord[]> => {
  const { headers, rows } = await readRows(raw);
  const columns = resolveColumns(headers);
  const cards = new Map<string, CardRecord>();
  const conditionsByCard = new Map<string, string[]>();

  rows.forEach((row, index) => {
    const rowNumber = index + FIRST_DATA_ROW;
    if (Object.values(row).every((value) => value === '')) {
      return;
    }

    const name = cell(row, columns.name);
    if (!name) {
      throw new MalformedCatalogError(rowNumber, columns.name ?? null, 'card name is missing');
    }

    const categoryLabel = cell(row, columns.category);
    if (!categoryLabel) {
      throw new MalformedCatalogError(rowNumber, columns.category ?? null, `no reward category for ${name}`);
    }
    const category = canonicalCategory(categoryLabel);

    const rateText = cell(row, columns.rate);
    const rate = parseRate(rateText);
    if (rate === null) {
      throw new MalformedCatalogError(rowNumber, columns.rate ?? null, `"${rateText}" is not a reward rate`);
    }
    if (rate < 0) {
      throw new MalformedCatalogError(rowNumber, columns.rate ?? null, `reward rate ${rateText} is negative`);
    }

    const activationText = cell(row, columns.activation);
    const activationRequired = parseFlag(activationText);
    if (activationRequired === null) {
      throw new MalformedCatalogError(
        rowNumber,
        columns.activation ?? null,
        `"${activationText}" is not a yes/no activation flag`
      );
    }

    const untilText = cell(row, columns.validUntil);
    const validUntil = parseCatalogDate(untilText);
    if (validUntil === null) {
      throw new MalformedCatalogError(rowNumber, columns.validUntil ?? null, `"${untilText}" is not a date`);
    }
    const fromText = cell(row, columns.validFrom);
    const validFrom = parseCatalogDate(fromText);
    if (validFrom === null) {
      throw new MalformedCatalogError(rowNumber, columns.validFrom ?? null, `"${fromText}" is not a date`);
    }

    const existing = cards.get(name);
    if (existing && existing.rewards[category] !== undefined) {
      throw new MalformedCatalogError(
        rowNumber,
        columns.category ?? null,
        `category ${category} is listed twice for ${name}`
      );
    }

    const record: CardRecord = existing ?? {
      name,
      bank: null,
      rewards: {},
      activationRequired: false,
      validFrom: null,
      validUntil: null,
      annualFee: null,
      conditions: ''
    };
    record.rewards[category] = rate;
    record.activationRequired = record.activationRequired || activationRequired;
    record.validUntil = earliest(record.validUntil, validUntil ?? null);
    record.validFrom = earliest(record.validFrom, validFrom ?? null);
    record.bank = record.bank ?? (cell(row, columns.bank) || null);
    record.annualFee = record.annualFee ?? parseAnnualFee(cell(row, columns.annualFee));
    cards.set(name, record);

    const conditions = cell(row, columns.conditions);
    const seen = conditionsByCard.get(name) ?? [];
    if (conditions && !seen.includes(conditions)) {
      seen.push(conditions);
    }
    conditionsByCard.set(name, seen);
  });

  if (cards.size === 0) {
    throw new MalformedCatalogError(FIRST_DATA_ROW, null, 'catalog contains no card rows');
  }

  const records = Array.from(cards.values()).map((record) => ({
    ...record,
    conditions: (conditionsByCard.get(record.name) ?? []).join('; ')
  }));
  logger.info(`[CATALOG] Parsed ${records.length} card(s) from ${rows.length} row(s)`);
  return records;
};

export const formatRate = (rate: number): string => `${Number(rate.toFixed(2))}%`;

export const describeActivation = (activationRequired: boolean): string =>
  activationRequired
    ? 'required (switch to this reward plan in the issuer app before spending)'
    : 'not required';

/**
 * The text a document is embedded from. Generation is grounded on nothing
 * else, so every rate and caveat has to appear here verbatim.
 */
export const renderCardText = (record: CardRecord): string => {
  const lines = [`Card: ${record.name}`];
  if (record.bank) {
    lines.push(`Issuer: ${record.bank}`);
  }
  lines.push('Rewards:');
  Object.entries(record.rewards).forEach(([category, rate]) => {
    lines.push(`- ${category}: ${formatRate(rate)}`);
  });
  lines.push(`Activation: ${describeActivation(record.activationRequired)}`);
  if (record.validFrom) {
    lines.push(`Valid from: ${record.validFrom}`);
  }
  lines.push(`Valid until: ${record.validUntil ?? 'no expiry'}`);
  if (record.annualFee !== null) {
    lines.push(`Annual fee: ${record.annualFee}`);
  }
  if (record.conditions) {
    lines.push(`Conditions: ${record.conditions}`);
  }
  return lines.join('\n');
};

export const buildIndexDocuments = (records: CardRecord[]): IndexDocument[] =>
  records.map((record) => ({
    id: record.name,
    text: renderCardText(record),
    metadata: {
      categories: Object.keys(record.rewards),
      activationRequired: record.activationRequired,
      validUntil: record.validUntil
    },
    card: record
  }));

export const toIsoDate = (date: Date): string => {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
};

export const isExpired = (validUntil: string | null, today: string): boolean =>
  validUntil !== null && validUntil < today;

export const findExpiredCards = (records: CardRecord[], today: string): CardRecord[] => {
  const expired = records.filter((record) => isExpired(record.validUntil, today));
  if (expired.length > 0) {
    logger.warn(`[CATALOG] ${expired.length} card offer(s) have expired`, {
      cards: expired.map((record) => record.name)
    });
  }
  return expired;
};
