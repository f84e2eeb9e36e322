import AWS from 'aws-sdk';
import OpenAI from 'openai';
import logger from './logger';
import type { Settings } from './config/settings';
import { CatalogVersionStore } from './version-store';
import { HashingEmbedder, OpenAIEmbedder } from './embeddings';
import type { Embedder } from './embeddings';
import { KnowledgeIndex } from './knowledge-index';
import { OpenAIAnswerGenerator } from './generation';
import type { AnswerGenerator } from './generation';
import { RecommendationEngine } from './recommendation-engine';
import { RefreshOrchestrator } from './refresh-orchestrator';
import { createCatalogSource } from './remote-source';
import { DynamoHeldCardStore, MemoryHeldCardStore } from './held-card-store';
import type { HeldCardStore } from './held-card-store';
import { createChatHandler } from './chat-commands';
import { useCategoryTableFile } from './category-inference';
import type { ChatHandler } from './chat-commands';
import type { AdminAuthConfig } from './admin-auth';

export interface Services {
  admin: AdminAuthConfig;
  versionStore: CatalogVersionStore;
  index: KnowledgeIndex;
  engine: RecommendationEngine;
  orchestrator: RefreshOrchestrator;
  heldCards: HeldCardStore;
  chat: ChatHandler;
}

export const createServices = (settings: Settings): Services => {
  if (settings.categoryTablePath) {
    useCategoryTableFile(settings.categoryTablePath);
  }
  const openai = settings.openai.apiKey ? new OpenAI({ apiKey: settings.openai.apiKey }) : null;

  let embedder: Embedder;
  let generator: AnswerGenerator | null = null;
  if (openai) {
    embedder = new OpenAIEmbedder({
      client: openai,
      model: settings.openai.embeddingModel,
      timeoutMs: settings.openai.timeoutMs
    });
    generator = new OpenAIAnswerGenerator({
      client: openai,
      model: settings.openai.chatModel,
      timeoutMs: settings.openai.timeoutMs
    });
  } else {
    logger.warn('[CONFIG] OPENAI_API_KEY is not set; using local hashing embeddings and templated answers');
    embedder = new HashingEmbedder();
  }

  const versionStore = new CatalogVersionStore({
    catalogDir: settings.catalogDir,
    maxBackups: settings.maxBackups,
    bundledCatalogPath: settings.bundledCatalogPath,
    legacyCatalogPath: settings.legacyCatalogPath
  });
  const index = new KnowledgeIndex({ indexDir: settings.indexDir, embedder });
  const engine = new RecommendationEngine({
    index,
    generator,
    candidatePoolSize: settings.candidatePoolSize
  });
  const orchestrator = new RefreshOrchestrator({
    versionStore,
    index,
    engine,
    remoteSource: createCatalogSource(settings)
  });

  let heldCards: HeldCardStore;
  if (settings.heldCardsTable) {
    const dynamodb = new AWS.DynamoDB.DocumentClient({ region: settings.awsRegion });
    heldCards = new DynamoHeldCardStore(dynamodb, settings.heldCardsTable);
  } else {
    logger.warn('[CONFIG] HELD_CARDS_TABLE is not set; held cards are kept in memory only');
    heldCards = new MemoryHeldCardStore();
  }

  return {
    admin: { adminApiKey: settings.adminApiKey, debug: settings.debug },
    versionStore,
    index,
    engine,
    orchestrator,
    heldCards,
    chat: createChatHandler({ engine, heldCards })
  };
};
