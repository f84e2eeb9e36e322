import logger from './logger';
import { GenerationUnavailableError, NotFoundError, describeError } from './errors';
import { formatRate, isExpired, toIsoDate } from './catalog-parser';
import type { CardRecord, IndexDocument } from './catalog-parser';
import { inferCategory, loadCategoryTable } from './category-inference';
import type { CategoryDefinition } from './category-inference';
import type { AnswerGenerator, GroundingFact } from './generation';
import type { IndexHandle, KnowledgeIndex } from './knowledge-index';
import { MIN_CANDIDATE_POOL } from './config/settings';

export interface RecommendationEntry {
  cardName: string;
  rate: number;
  category: string;
  activationRequired: boolean;
  validUntil: string | null;
  conditions: string;
  /** null when the card was found by name rather than by similarity */
  similarity: number | null;
}

export interface ExpiredCard {
  cardName: string;
  validUntil: string;
}

export type SummarySource = 'generated' | 'template' | 'fixed';

export type RetrievalPath = 'none' | 'semantic' | 'semantic+lookup' | 'lookup';

export interface RecommendationResult {
  query: string;
  category: string | null;
  categoryInferred: boolean;
  recommendations: RecommendationEntry[];
  expired: ExpiredCard[];
  unknownCards: string[];
  summary: string;
  summarySource: SummarySource;
  retrieval: RetrievalPath;
  notes: string[];
  indexVersion: string | null;
}

export interface HeldCardDetails {
  cardName: string;
  inCatalog: boolean;
  bank: string | null;
  annualFee: number | null;
  activationRequired: boolean;
  validUntil: string | null;
  expired: boolean;
  rewards: Record<string, number>;
}

export interface RecommendationEngineOptions {
  index: KnowledgeIndex;
  generator: AnswerGenerator | null;
  candidatePoolSize?: number;
  topN?: number;
  now?: () => Date;
  categoryTable?: CategoryDefinition[];
}

export const NO_CARDS_MESSAGE =
  'You have not added any cards yet. Send "/add <card name>" to register the cards you hold.';
export const CATEGORY_UNKNOWN_NOTE =
  "Could not tell which spending category the question is about; cards are ranked by their best reward rate.";

const compareNames = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

export const byRateThenName = (a: RecommendationEntry, b: RecommendationEntry) =>
  b.rate - a.rate || compareNames(a.cardName, b.cardName);

const bestReward = (card: CardRecord): { category: string; rate: number } | null => {
  const rewards = Object.entries(card.rewards).sort(([ca, ra], [cb, rb]) => rb - ra || compareNames(ca, cb));
  return rewards.length > 0 ? { category: rewards[0][0], rate: rewards[0][1] } : null;
};

const describeCaveats = (entry: RecommendationEntry): string => {
  const caveats: string[] = [];
  if (entry.activationRequired) {
    caveats.push('activate the reward plan in the issuer app first');
  }
  if (entry.validUntil) {
    caveats.push(`valid until ${entry.validUntil}`);
  }
  return caveats.length > 0 ? ` (${caveats.join('; ')})` : '';
};

const describeExpired = (expired: ExpiredCard[]): string | null =>
  expired.length > 0
    ? `Expired offers left out: ${expired.map((card) => `${card.cardName} (ended ${card.validUntil})`).join(', ')}`
    : null;

/**
 * The summary used whenever generation is unavailable. Built from the same
 * ranked facts, so it never disagrees with the ranking.
 */
export const renderTemplateSummary = (
  query: string,
  category: string | null,
  recommendations: RecommendationEntry[],
  expired: ExpiredCard[]
): string => {
  const lines: string[] = [];
  if (recommendations.length === 0) {
    lines.push(
      category
        ? `None of your cards earns a reward on ${category}.`
        : `None of your cards has a reward that fits "${query}".`
    );
  } else if (category) {
    const [top] = recommendations;
    lines.push(`Best card for ${category}: ${top.cardName} (${formatRate(top.rate)}).`);
  } else {
    lines.push(`Could not tell the spending category of "${query}". Your cards by their best reward rate:`);
  }
  recommendations.forEach((entry, index) => {
    lines.push(`${index + 1}. ${entry.cardName}: ${formatRate(entry.rate)} on ${entry.category}${describeCaveats(entry)}`);
  });
  const expiredLine = describeExpired(expired);
  if (expiredLine) {
    lines.push(expiredLine);
  }
  return lines.join('\n');
};

const buildPrompt = (query: string, category: string | null) =>
  [
    `User question: ${query}`,
    `Spending category: ${category ?? 'unknown'}`,
    'Recommend which of the user\'s cards to use, following the ranking below.'
  ].join('\n');

/**
 * Ranks a user's held cards for a spending question. Holds the single active
 * index handle; refreshes replace the reference, never the handle's contents.
 */
export class RecommendationEngine {
  private active: IndexHandle | null = null;
  private readonly index: KnowledgeIndex;
  private readonly generator: AnswerGenerator | null;
  private readonly candidatePoolSize: number;
  private readonly topN: number;
  private readonly now: () => Date;
  private readonly categoryTable: CategoryDefinition[] | undefined;

  constructor(options: RecommendationEngineOptions) {
    this.index = options.index;
    this.generator = options.generator;
    this.candidatePoolSize = Math.max(MIN_CANDIDATE_POOL, options.candidatePoolSize ?? MIN_CANDIDATE_POOL);
    this.topN = options.topN ?? 3;
    this.now = options.now ?? (() => new Date());
    this.categoryTable = options.categoryTable;
  }

  activeHandle(): IndexHandle | null {
    return this.active;
  }

  /** Replaces the active handle and returns the one it replaced. */
  swapIndex(next: IndexHandle): IndexHandle | null {
    const previous = this.active;
    this.active = next;
    logger.info(`[ENGINE] Active index is now ${next.id}`, { previous: previous?.id ?? null });
    return previous;
  }

  catalogCardNames(): string[] {
    return this.active ? this.index.cardNames(this.active) : [];
  }

  countExpired(handle: IndexHandle | null = this.active): number {
    if (!handle) {
      return 0;
    }
    const today = toIsoDate(this.now());
    return handle.entries.filter((entry) => isExpired(entry.document.card.validUntil, today)).length;
  }

  async recommend(query: string, heldCards: Iterable<string>): Promise<RecommendationResult> {
    const held = new Set(Array.from(heldCards, (name) => name.trim()).filter(Boolean));
    if (held.size === 0) {
      return {
        query,
        category: null,
        categoryInferred: false,
        recommendations: [],
        expired: [],
        unknownCards: [],
        summary: NO_CARDS_MESSAGE,
        summarySource: 'fixed',
        retrieval: 'none',
        notes: [],
        indexVersion: null
      };
    }

    // One read of the shared reference; a concurrent swap cannot change this request's view.
    const handle = this.active;
    if (!handle) {
      throw new NotFoundError('The card catalog is not loaded yet. Please try again shortly.');
    }

    const notes: string[] = [];
    const similarity = await this.retrieveHeld(handle, query, held, notes);

    // Lookup by name decides which held cards are considered; similarity only annotates them.
    const candidates: IndexDocument[] = [];
    const unknownCards: string[] = [];
    Array.from(held)
      .sort(compareNames)
      .forEach((name) => {
        const document = this.index.findByName(handle, name);
        if (document) {
          candidates.push(document);
        } else {
          unknownCards.push(name);
        }
      });
    if (unknownCards.length > 0) {
      notes.push(`Not in the current catalog: ${unknownCards.join(', ')}`);
    }

    const categories = new Set(handle.entries.flatMap((entry) => entry.document.metadata.categories));
    const category = inferCategory(query, categories, this.categoryTable ?? loadCategoryTable());
    if (!category) {
      notes.push(CATEGORY_UNKNOWN_NOTE);
    }

    const today = toIsoDate(this.now());
    const expired: ExpiredCard[] = [];
    const ranked: RecommendationEntry[] = [];
    candidates.forEach(({ card }) => {
      if (card.validUntil !== null && isExpired(card.validUntil, today)) {
        expired.push({ cardName: card.name, validUntil: card.validUntil });
        return;
      }
      const reward = category
        ? { category, rate: card.rewards[category] ?? 0 }
        : bestReward(card);
      if (!reward || (category && reward.rate <= 0)) {
        return;
      }
      ranked.push({
        cardName: card.name,
        rate: reward.rate,
        category: reward.category,
        activationRequired: card.activationRequired,
        validUntil: card.validUntil,
        conditions: card.conditions,
        similarity: similarity.get(card.name) ?? null
      });
    });
    ranked.sort(byRateThenName);
    const recommendations = category ? ranked.slice(0, this.topN) : ranked;

    const retrieval: RetrievalPath =
      similarity.size === 0 ? 'lookup' : similarity.size < candidates.length ? 'semantic+lookup' : 'semantic';
    const { summary, summarySource } = await this.summarize(query, category, recommendations, expired, notes);

    return {
      query,
      category,
      categoryInferred: category !== null,
      recommendations,
      expired,
      unknownCards,
      summary,
      summarySource,
      retrieval,
      notes,
      indexVersion: handle.sourceVersionId
    };
  }

  describeHeldCards(heldCards: Iterable<string>): HeldCardDetails[] {
    const handle = this.active;
    const today = toIsoDate(this.now());
    return Array.from(new Set(heldCards))
      .sort(compareNames)
      .map((cardName) => {
        const card = handle ? this.index.findByName(handle, cardName)?.card : undefined;
        if (!card) {
          return {
            cardName,
            inCatalog: false,
            bank: null,
            annualFee: null,
            activationRequired: false,
            validUntil: null,
            expired: false,
            rewards: {}
          };
        }
        return {
          cardName,
          inCatalog: true,
          bank: card.bank,
          annualFee: card.annualFee,
          activationRequired: card.activationRequired,
          validUntil: card.validUntil,
          expired: isExpired(card.validUntil, today),
          rewards: { ...card.rewards }
        };
      });
  }

  private async retrieveHeld(
    handle: IndexHandle,
    query: string,
    held: Set<string>,
    notes: string[]
  ): Promise<Map<string, number>> {
    const k = Math.max(this.candidatePoolSize, held.size * 3);
    const similarity = new Map<string, number>();
    try {
      const retrieved = await this.index.query(handle, query, k);
      retrieved
        .filter(({ document }) => held.has(document.id))
        .forEach(({ document, score }) => similarity.set(document.id, score));
    } catch (error) {
      logger.warn(`[ENGINE] Similarity search failed; ranking by name lookup only: ${describeError(error)}`);
      notes.push('Similarity search was unavailable; every held card was looked up by name.');
    }
    return similarity;
  }

  private async summarize(
    query: string,
    category: string | null,
    recommendations: RecommendationEntry[],
    expired: ExpiredCard[],
    notes: string[]
  ): Promise<{ summary: string; summarySource: SummarySource }> {
    const template = renderTemplateSummary(query, category, recommendations, expired);
    if (!this.generator || recommendations.length === 0) {
      return { summary: template, summarySource: 'template' };
    }

    const facts: GroundingFact[] = recommendations.map((entry, index) => ({
      rank: index + 1,
      cardName: entry.cardName,
      category: entry.category,
      rate: entry.rate,
      activationRequired: entry.activationRequired,
      validUntil: entry.validUntil,
      conditions: entry.conditions
    }));
    try {
      const generated = await this.generator.generate(buildPrompt(query, category), facts);
      const expiredLine = describeExpired(expired);
      return {
        summary: expiredLine ? `${generated}\n${expiredLine}` : generated,
        summarySource: 'generated'
      };
    } catch (error) {
      const reason = error instanceof GenerationUnavailableError ? error.reason : 'unexpected';
      logger.warn(`[ENGINE] Generation unavailable (${reason}); using the templated summary`);
      notes.push(`The written summary is a template because the language model was unavailable (${reason}).`);
      return { summary: template, summarySource: 'template' };
    }
  }
}
