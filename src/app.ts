import express, { Express, Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { ApolloServer } from '@apollo/server';
import { expressMiddleware } from '@apollo/server/express4';
import logger from './logger';
import { AdvisorError, toPublicError } from './errors';
import { getAdminKeyFromRequest, requireAdminKey } from './admin-auth';
import { resolveHeldCards } from './held-card-store';
import { typeDefs } from './graphql/schema';
import { createResolvers } from './graphql/resolvers';
import type { GraphQLContext } from './graphql/resolvers';
import type { Services } from './services';
import { isRecord, isStringArray } from './type-guards';

const readString = (body: unknown, field: string): string | null => {
  const value = isRecord(body) ? body[field] : undefined;
  return typeof value === 'string' && value.trim() ? value.trim() : null;
};

const sendError = (res: Response, error: unknown, context: string) => {
  if (!(error instanceof AdvisorError)) {
    logger.error(`[HTTP] ${context} failed`, { error });
  }
  const { status, code, message } = toPublicError(error);
  res.status(status).json({ error: message, code });
};

export const createApolloServer = (services: Services) =>
  new ApolloServer<GraphQLContext>({
    typeDefs,
    resolvers: createResolvers(services)
  });

/**
 * Builds the HTTP surface over an already wired set of services. Apollo is
 * started here so the caller only has to listen.
 */
export async function createApp(services: Services): Promise<{ app: Express; apollo: ApolloServer<GraphQLContext> }> {
  const { engine, heldCards, orchestrator, versionStore, chat } = services;
  const app: Express = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json());

  // Request logging
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.info(`[HTTP] ${req.method} ${req.path}`);
    next();
  });

  app.get('/health', (_req: Request, res: Response): void => {
    const status = orchestrator.status();
    res.status(status.healthy ? 200 : 503).json({
      status: status.healthy ? 'healthy' : 'unhealthy',
      documentCount: status.documentCount,
      currentVersionId: status.currentVersionId,
      refreshInProgress: status.refreshInProgress,
      timestamp: new Date().toISOString()
    });
  });

  app.get('/status', (_req: Request, res: Response): void => {
    res.json(orchestrator.status());
  });

  app.post('/recommend', async (req: Request, res: Response) => {
    const query = readString(req.body, 'query');
    const explicit = isRecord(req.body) ? req.body.heldCards : undefined;
    if (!query) {
      res.status(400).json({ error: 'query is required' });
      return;
    }
    if (explicit !== undefined && explicit !== null && !isStringArray(explicit)) {
      res.status(400).json({ error: 'heldCards must be an array of card names' });
      return;
    }
    try {
      const held = await resolveHeldCards(heldCards, explicit, readString(req.body, 'userId'));
      res.json(await engine.recommend(query, held));
    } catch (error) {
      sendError(res, error, 'recommend');
    }
  });

  app.post('/chat', async (req: Request, res: Response) => {
    const userId = readString(req.body, 'userId');
    const text = readString(req.body, 'text');
    if (!userId || !text) {
      res.status(400).json({ error: 'userId and text are required' });
      return;
    }
    res.json({ reply: await chat(userId, text) });
  });

  app.get('/api/users/:userId/cards', async (req: Request, res: Response) => {
    try {
      const cards = await heldCards.getHeldCards(req.params.userId);
      res.json({ userId: req.params.userId, cards: engine.describeHeldCards(cards) });
    } catch (error) {
      sendError(res, error, 'list held cards');
    }
  });

  app.post('/api/users/:userId/cards', async (req: Request, res: Response) => {
    const cardName = readString(req.body, 'cardName');
    if (!cardName) {
      res.status(400).json({ error: 'cardName is required' });
      return;
    }
    if (!engine.catalogCardNames().includes(cardName)) {
      res.status(404).json({ error: `"${cardName}" is not in the card catalog` });
      return;
    }
    try {
      const added = await heldCards.addCard(req.params.userId, cardName);
      const cardCount = (await heldCards.getHeldCards(req.params.userId)).size;
      res.status(added ? 201 : 200).json({ cardName, changed: added, cardCount });
    } catch (error) {
      sendError(res, error, 'add held card');
    }
  });

  app.delete('/api/users/:userId/cards/:cardName', async (req: Request, res: Response) => {
    const { userId, cardName } = req.params;
    try {
      const removed = await heldCards.removeCard(userId, cardName);
      if (!removed) {
        res.status(404).json({ error: `"${cardName}" is not among the user's cards` });
        return;
      }
      const cardCount = (await heldCards.getHeldCards(userId)).size;
      res.json({ cardName, changed: true, cardCount });
    } catch (error) {
      sendError(res, error, 'remove held card');
    }
  });

  const adminOnly = requireAdminKey(services.admin);

  app.post('/admin/refresh', adminOnly, async (req: Request, res: Response) => {
    const fetchRemote = isRecord(req.body) ? req.body.fetchRemote : undefined;
    if (fetchRemote !== undefined && typeof fetchRemote !== 'boolean') {
      res.status(400).json({ error: 'fetchRemote must be a boolean' });
      return;
    }
    try {
      const report = await orchestrator.refresh(fetchRemote === undefined ? {} : { fetchRemote });
      res.status(report.status === 'succeeded' ? 200 : 422).json(report);
    } catch (error) {
      sendError(res, error, 'refresh');
    }
  });

  app.get('/admin/versions', adminOnly, (_req: Request, res: Response): void => {
    res.json(versionStore.listVersions());
  });

  const apollo = createApolloServer(services);
  await apollo.start();
  app.use(
    '/graphql',
    expressMiddleware(apollo, {
      context: async ({ req }) => ({ adminKey: getAdminKeyFromRequest(req) })
    })
  );

  // 404 handler
  app.use((_req: Request, res: Response): void => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handling middleware
  const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
    logger.error('[HTTP] Unhandled error', { error: err });
    res.status(500).json({ error: 'Internal server error' });
  };
  app.use(errorHandler);

  return { app, apollo };
}
