import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, GetCommand, PutCommand } from '@aws-sdk/lib-dynamodb';
import { CacheEntry } from '../../types/index.js';
import { CacheStore, nowInSeconds } from './cache-store.js';

export interface DynamoCacheStoreOptions {
  tableName: string;
  region: string;
  endpoint?: string;
  now?: () => number;
}

/**
 * DynamoDB-backed cache (the durable store).
 *
 * Table layout: partition key `RequestHash` (S), `Response` (S) and `TTL` (N,
 * epoch seconds, registered as the table's TTL attribute). DynamoDB removes
 * expired items lazily, so reads filter on TTL as well.
 */
export class DynamoCacheStore implements CacheStore {
  readonly kind = 'dynamodb';
  private readonly client: DynamoDBClient;
  private readonly documentClient: DynamoDBDocumentClient;
  private readonly tableName: string;
  private readonly now: () => number;

  constructor(options: DynamoCacheStoreOptions) {
    this.tableName = options.tableName;
    this.now = options.now ?? Date.now;
    this.client = new DynamoDBClient({
      region: options.region,
      ...(options.endpoint ? { endpoint: options.endpoint } : {})
    });
    this.documentClient = DynamoDBDocumentClient.from(this.client);
  }

  async getItem(key: string): Promise<CacheEntry | null> {
    const response = await this.documentClient.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { RequestHash: key }
      })
    );

    const item: Record<string, unknown> | undefined = response.Item;
    if (!item) return null;

    const value = item['Response'];
    const ttl = item['TTL'];
    if (typeof value !== 'string' || typeof ttl !== 'number') {
      return null;
    }
    if (ttl <= nowInSeconds(this.now)) {
      return null;
    }

    return { key, value, expiresAt: ttl };
  }

  async putItem(entry: CacheEntry): Promise<void> {
    await this.documentClient.send(
      new PutCommand({
        TableName: this.tableName,
        Item: {
          RequestHash: entry.key,
          Response: entry.value,
          TTL: entry.expiresAt
        }
      })
    );
  }

  async close(): Promise<void> {
    this.documentClient.destroy();
    this.client.destroy();
  }
}
