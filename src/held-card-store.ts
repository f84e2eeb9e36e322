import AWS from 'aws-sdk';
import logger from './logger';
import { isRecord } from './type-guards';

/** Which cards each user has registered as owned. */
export interface HeldCardStore {
  getHeldCards(userId: string): Promise<Set<string>>;
  /** false when the user already held the card */
  addCard(userId: string, cardName: string): Promise<boolean>;
  /** false when the user did not hold the card */
  removeCard(userId: string, cardName: string): Promise<boolean>;
  /** number of cards removed */
  clearCards(userId: string): Promise<number>;
}

export class MemoryHeldCardStore implements HeldCardStore {
  private readonly cardsByUser = new Map<string, Set<string>>();

  async getHeldCards(userId: string): Promise<Set<string>> {
    return new Set(this.cardsByUser.get(userId) ?? []);
  }

  async addCard(userId: string, cardName: string): Promise<boolean> {
    const cards = this.cardsByUser.get(userId) ?? new Set<string>();
    if (cards.has(cardName)) {
      return false;
    }
    cards.add(cardName);
    this.cardsByUser.set(userId, cards);
    return true;
  }

  async removeCard(userId: string, cardName: string): Promise<boolean> {
    return this.cardsByUser.get(userId)?.delete(cardName) ?? false;
  }

  async clearCards(userId: string): Promise<number> {
    const count = this.cardsByUser.get(userId)?.size ?? 0;
    this.cardsByUser.delete(userId);
    return count;
  }
}

// DocumentClient string sets arrive as `{ values: string[] }` wrappers.
const readStringSet = (value: unknown): string[] => {
  const values = isRecord(value) ? value.values : undefined;
  return Array.isArray(values) ? values.filter((entry): entry is string => typeof entry === 'string') : [];
};

/**
 * One item per user: `{ UserId, Cards: StringSet, UpdatedAt }`. Set updates
 * use ADD/DELETE so concurrent edits to one user do not overwrite each other.
 */
export class DynamoHeldCardStore implements HeldCardStore {
  constructor(
    private readonly dynamodb: AWS.DynamoDB.DocumentClient,
    private readonly tableName: string
  ) {}

  async getHeldCards(userId: string): Promise<Set<string>> {
    const result = await this.dynamodb
      .get({ TableName: this.tableName, Key: { UserId: userId }, ProjectionExpression: 'Cards' })
      .promise();
    return new Set(readStringSet(result.Item?.Cards));
  }

  async addCard(userId: string, cardName: string): Promise<boolean> {
    const result = await this.dynamodb
      .update({
        TableName: this.tableName,
        Key: { UserId: userId },
        UpdateExpression: 'ADD #Cards :card SET #UpdatedAt = :now',
        ExpressionAttributeNames: { '#Cards': 'Cards', '#UpdatedAt': 'UpdatedAt' },
        ExpressionAttributeValues: {
          ':card': this.dynamodb.createSet([cardName]),
          ':now': Date.now()
        },
        ReturnValues: 'UPDATED_OLD'
      })
      .promise();
    const added = !readStringSet(result.Attributes?.Cards).includes(cardName);
    logger.debug(`[HELD-CARDS] add ${cardName} for ${userId}: ${added ? 'added' : 'already held'}`);
    return added;
  }

  async removeCard(userId: string, cardName: string): Promise<boolean> {
    const result = await this.dynamodb
      .update({
        TableName: this.tableName,
        Key: { UserId: userId },
        UpdateExpression: 'DELETE #Cards :card SET #UpdatedAt = :now',
        ExpressionAttributeNames: { '#Cards': 'Cards', '#UpdatedAt': 'UpdatedAt' },
        ExpressionAttributeValues: {
          ':card': this.dynamodb.createSet([cardName]),
          ':now': Date.now()
        },
        ReturnValues: 'UPDATED_OLD'
      })
      .promise();
    return readStringSet(result.Attributes?.Cards).includes(cardName);
  }

  async clearCards(userId: string): Promise<number> {
    const result = await this.dynamodb
      .update({
        TableName: this.tableName,
        Key: { UserId: userId },
        UpdateExpression: 'REMOVE #Cards SET #UpdatedAt = :now',
        ExpressionAttributeNames: { '#Cards': 'Cards', '#UpdatedAt': 'UpdatedAt' },
        ExpressionAttributeValues: { ':now': Date.now() },
        ReturnValues: 'UPDATED_OLD'
      })
      .promise();
    return readStringSet(result.Attributes?.Cards).length;
  }
}

/** An explicit list wins; otherwise the user's stored cards; otherwise none. */
export const resolveHeldCards = async (
  store: HeldCardStore,
  explicit: string[] | null | undefined,
  userId: string | null | undefined
): Promise<Set<string>> => {
  if (explicit) {
    return new Set(explicit);
  }
  return userId ? store.getHeldCards(userId) : new Set<string>();
};
