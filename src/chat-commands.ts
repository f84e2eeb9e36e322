import logger from './logger';
import { AdvisorError, toPublicError } from './errors';
import { formatRate } from './catalog-parser';
import type { HeldCardStore } from './held-card-store';
import type { HeldCardDetails, RecommendationEngine, RecommendationResult } from './recommendation-engine';

export const WELCOME_MESSAGE = [
  'Hi! I tell you which of your credit cards pays the most for what you are about to buy.',
  '1. Register your cards with /add <card name>',
  '2. Ask something like "dinner tonight" or "filling up the car"',
  'Send /help for every command.'
].join('\n');

export const HELP_MESSAGE = [
  'Commands:',
  '/add <card name> - register a card you hold',
  '/remove <card name> - forget a card',
  '/list - show your cards',
  '/mycards - show reward details for your cards',
  '/clear - forget all your cards',
  'Anything else is treated as a spending question.'
].join('\n');

export const NOT_READY_MESSAGE = 'The card catalog is still loading. Please try again in a moment.';

const MAX_SUGGESTIONS = 5;

export interface ChatDependencies {
  engine: RecommendationEngine;
  heldCards: HeldCardStore;
}

const normalizeName = (value: string) => value.toLowerCase().replace(/\s+/g, '');

export const suggestCardNames = (input: string, catalog: string[]): string[] => {
  const needle = normalizeName(input);
  if (!needle) {
    return [];
  }
  return catalog
    .filter((name) => {
      const candidate = normalizeName(name);
      return candidate.includes(needle) || needle.includes(candidate);
    })
    .slice(0, MAX_SUGGESTIONS);
};

export const formatRecommendationReply = (result: RecommendationResult): string => {
  const lines = [result.summary];
  if (result.unknownCards.length > 0) {
    lines.push(`Not found in the current catalog: ${result.unknownCards.join(', ')}`);
  }
  return lines.join('\n\n');
};

export const formatHeldCardDetails = (details: HeldCardDetails[]): string => {
  if (details.length === 0) {
    return 'You have not added any cards yet.';
  }
  const blocks = details.map((card) => {
    if (!card.inCatalog) {
      return `${card.cardName}\n  not in the current catalog`;
    }
    const rewards = Object.entries(card.rewards)
      .map(([category, rate]) => `${category} ${formatRate(rate)}`)
      .join(', ');
    return [
      card.cardName,
      `  Issuer: ${card.bank ?? 'unknown'}`,
      `  Annual fee: ${card.annualFee ?? 'unknown'}`,
      `  Rewards: ${rewards}`,
      `  App activation: ${card.activationRequired ? 'required' : 'not required'}`,
      `  Valid until: ${card.validUntil ?? 'no expiry'}${card.expired ? ' (expired)' : ''}`
    ].join('\n');
  });
  return [`Your cards (${details.length}):`, ...blocks].join('\n\n');
};

const commandArgument = (text: string, command: string): string | null => {
  const match = text.match(new RegExp(`^${command}(?:\\s+(.*))?$`, 'is'));
  return match ? (match[1] ?? '').trim() : null;
};

/**
 * Turns one message from the messaging adapter into one reply. Card
 * registration goes through the held-card store; every other text is a
 * recommendation query.
 */
export const createChatHandler = ({ engine, heldCards }: ChatDependencies) => {
  const addCard = async (userId: string, cardName: string): Promise<string> => {
    if (!cardName) {
      return 'Tell me which card to add, e.g. /add Example Cashback Card';
    }
    const catalog = engine.catalogCardNames();
    if (!catalog.includes(cardName)) {
      const suggestions = suggestCardNames(cardName, catalog);
      if (suggestions.length > 0) {
        return [
          `Could not find "${cardName}". Did you mean:`,
          ...suggestions.map((name) => `- ${name}`),
          'Please use the full card name.'
        ].join('\n');
      }
      return `Could not find "${cardName}" in the catalog.`;
    }
    if (!(await heldCards.addCard(userId, cardName))) {
      return `You already added "${cardName}".`;
    }
    const count = (await heldCards.getHeldCards(userId)).size;
    return `Added "${cardName}". You now have ${count} card(s).`;
  };

  const removeCard = async (userId: string, cardName: string): Promise<string> => {
    if (!(await heldCards.removeCard(userId, cardName))) {
      return `You do not have "${cardName}".`;
    }
    const count = (await heldCards.getHeldCards(userId)).size;
    return `Removed "${cardName}". You now have ${count} card(s).`;
  };

  const listCards = async (userId: string): Promise<string> => {
    const cards = Array.from(await heldCards.getHeldCards(userId)).sort();
    if (cards.length === 0) {
      return 'You have not added any cards yet. Use /add <card name> to add one.';
    }
    return [`Your cards (${cards.length}):`, ...cards.map((card, index) => `${index + 1}. ${card}`)].join('\n');
  };

  const clearCards = async (userId: string): Promise<string> => {
    const removed = await heldCards.clearCards(userId);
    return removed > 0 ? `Removed ${removed} card(s).` : 'You do not have any cards.';
  };

  const answer = async (userId: string, text: string): Promise<string> => {
    const trimmed = text.trim();
    const lower = trimmed.toLowerCase();
    if (lower === '/start') return WELCOME_MESSAGE;
    if (lower === '/help') return HELP_MESSAGE;

    const toAdd = commandArgument(trimmed, '/add');
    if (toAdd !== null) return addCard(userId, toAdd);
    const toRemove = commandArgument(trimmed, '/remove');
    if (toRemove !== null) return removeCard(userId, toRemove);
    if (lower === '/list') return listCards(userId);
    if (lower === '/clear') return clearCards(userId);

    if (!engine.activeHandle()) {
      return NOT_READY_MESSAGE;
    }
    if (lower === '/mycards') {
      return formatHeldCardDetails(engine.describeHeldCards(await heldCards.getHeldCards(userId)));
    }
    const result = await engine.recommend(trimmed, await heldCards.getHeldCards(userId));
    return formatRecommendationReply(result);
  };

  return async (userId: string, text: string): Promise<string> => {
    try {
      return await answer(userId, text);
    } catch (error) {
      if (!(error instanceof AdvisorError)) {
        logger.error('[CHAT] Failed to answer message', { userId, error });
      }
      return toPublicError(error).message;
    }
  };
};

export type ChatHandler = ReturnType<typeof createChatHandler>;
