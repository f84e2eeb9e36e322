import { GraphQLError } from 'graphql';
import logger from '../logger';
import { AdvisorError, toPublicError } from '../errors';
import { isAdminKeyValid } from '../admin-auth';
import { resolveHeldCards } from '../held-card-store';
import type { Services } from '../services';

export interface GraphQLContext {
  adminKey: string | null;
}

const toGraphQLError = (error: unknown, operation: string): GraphQLError => {
  if (error instanceof GraphQLError) {
    return error;
  }
  if (!(error instanceof AdvisorError)) {
    logger.error(`[GRAPHQL] ${operation} failed`, { error });
  }
  const { code, message, status } = toPublicError(error);
  return new GraphQLError(message, { extensions: { code, http: { status } } });
};

const requireAdmin = (services: Services, context: GraphQLContext) => {
  if (!isAdminKeyValid(services.admin, context.adminKey)) {
    throw new GraphQLError('Unauthorized', { extensions: { code: 'UNAUTHORIZED', http: { status: 401 } } });
  }
};

export const createResolvers = (services: Services) => {
  const { engine, heldCards, orchestrator, versionStore } = services;

  const queryResolvers = {
    async recommend(
      _parent: unknown,
      { query, heldCards: explicit, userId }: { query: string; heldCards?: string[] | null; userId?: string | null }
    ) {
      try {
        return await engine.recommend(query, await resolveHeldCards(heldCards, explicit, userId));
      } catch (error) {
        throw toGraphQLError(error, 'recommend');
      }
    },

    async heldCards(_parent: unknown, { userId }: { userId: string }) {
      try {
        return engine.describeHeldCards(await heldCards.getHeldCards(userId)).map((card) => ({
          ...card,
          rewards: Object.entries(card.rewards).map(([category, rate]) => ({ category, rate }))
        }));
      } catch (error) {
        throw toGraphQLError(error, 'heldCards');
      }
    },

    catalogStatus() {
      return orchestrator.status();
    },

    catalogVersions(_parent: unknown, _args: unknown, context: GraphQLContext) {
      requireAdmin(services, context);
      return versionStore.listVersions();
    }
  };

  const mutationResolvers = {
    async refreshCatalog(
      _parent: unknown,
      { fetchRemote }: { fetchRemote?: boolean | null },
      context: GraphQLContext
    ) {
      requireAdmin(services, context);
      try {
        return await orchestrator.refresh(fetchRemote === null || fetchRemote === undefined ? {} : { fetchRemote });
      } catch (error) {
        throw toGraphQLError(error, 'refreshCatalog');
      }
    },

    async addHeldCard(_parent: unknown, { userId, cardName }: { userId: string; cardName: string }) {
      if (!engine.catalogCardNames().includes(cardName)) {
        throw new GraphQLError(`"${cardName}" is not in the card catalog`, {
          extensions: { code: 'BAD_USER_INPUT' }
        });
      }
      try {
        const changed = await heldCards.addCard(userId, cardName);
        const cardCount = (await heldCards.getHeldCards(userId)).size;
        return { cardName, changed, cardCount };
      } catch (error) {
        throw toGraphQLError(error, 'addHeldCard');
      }
    },

    async removeHeldCard(_parent: unknown, { userId, cardName }: { userId: string; cardName: string }) {
      try {
        const changed = await heldCards.removeCard(userId, cardName);
        const cardCount = (await heldCards.getHeldCards(userId)).size;
        return { cardName, changed, cardCount };
      } catch (error) {
        throw toGraphQLError(error, 'removeHeldCard');
      }
    }
  };

  return { Query: queryResolvers, Mutation: mutationResolvers };
};
