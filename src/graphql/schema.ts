export const typeDefs = `#graphql
  # ============================================================================
  # RECOMMENDATION TYPES
  # ============================================================================
  type Recommendation {
    cardName: String!
    rate: Float!
    category: String!
    activationRequired: Boolean!
    validUntil: String
    conditions: String!
    similarity: Float
  }

  type ExpiredCard {
    cardName: String!
    validUntil: String!
  }

  type RecommendationResult {
    query: String!
    category: String
    categoryInferred: Boolean!
    recommendations: [Recommendation!]!
    expired: [ExpiredCard!]!
    unknownCards: [String!]!
    summary: String!
    summarySource: String!
    retrieval: String!
    notes: [String!]!
    indexVersion: String
  }

  # ============================================================================
  # HELD CARD TYPES
  # ============================================================================
  type RewardRate {
    category: String!
    rate: Float!
  }

  type HeldCard {
    cardName: String!
    inCatalog: Boolean!
    bank: String
    annualFee: Float
    activationRequired: Boolean!
    validUntil: String
    expired: Boolean!
    rewards: [RewardRate!]!
  }

  type HeldCardChange {
    cardName: String!
    changed: Boolean!
    cardCount: Int!
  }

  # ============================================================================
  # CATALOG TYPES
  # ============================================================================
  type RemoteOutcome {
    attempted: Boolean!
    fetched: Boolean!
    source: String
    error: String
  }

  type RefreshReport {
    status: String!
    runId: ID!
    startedAt: String!
    finishedAt: String!
    durationMs: Int!
    remote: RemoteOutcome!
    backupCount: Int!
    versionId: String
    indexId: String
    documentCount: Int
    expiredCardsCount: Int
    errorCode: String
    reason: String
    row: Int
  }

  type CatalogStatus {
    healthy: Boolean!
    documentCount: Int!
    expiredCardsCount: Int!
    currentVersionId: String
    indexId: String
    builtAt: String
    backupCount: Int!
    refreshInProgress: Boolean!
    lastRefresh: RefreshReport
  }

  type CatalogVersion {
    id: ID!
    filename: String!
    createdAt: String!
    sizeBytes: Int!
    sha256: String!
  }

  type CatalogVersions {
    current: CatalogVersion
    history: [CatalogVersion!]!
  }

  # ============================================================================
  # QUERIES & MUTATIONS
  # ============================================================================
  type Query {
    recommend(query: String!, heldCards: [String!], userId: ID): RecommendationResult!
    heldCards(userId: ID!): [HeldCard!]!
    catalogStatus: CatalogStatus!
    catalogVersions: CatalogVersions!
  }

  type Mutation {
    refreshCatalog(fetchRemote: Boolean): RefreshReport!
    addHeldCard(userId: ID!, cardName: String!): HeldCardChange!
    removeHeldCard(userId: ID!, cardName: String!): HeldCardChange!
  }
`;
