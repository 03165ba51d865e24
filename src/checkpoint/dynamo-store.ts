import {
  DynamoDBClient,
  PutItemCommand,
  QueryCommand,
  DeleteItemCommand,
  ScanCommand,
  CreateTableCommand,
  DescribeTableCommand,
} from '@aws-sdk/client-dynamodb';
import type { AttributeValue } from '@aws-sdk/client-dynamodb';
import { CheckpointSchema } from './types.js';
import type { Checkpoint } from './types.js';
import type { CheckpointStore } from './store.js';
import { planSave } from './ordering.js';

const PK = 'pk'; // partition key: task id
const SK = 'sk'; // sort key: zero-padded sequence
const SEQ_WIDTH = 12;

function sortKey(sequence: number): string {
  return String(sequence).padStart(SEQ_WIDTH, '0');
}

function fromItem(item: Record<string, AttributeValue>): Checkpoint {
  return CheckpointSchema.parse({
    taskId: item[PK]?.S,
    sequence: Number(item[SK]?.S),
    timestamp: item.timestamp?.S,
    reason: item.reason?.S,
    state: JSON.parse(item.state?.S ?? 'null'),
  });
}

export interface DynamoCheckpointStoreOptions {
  tableName: string;
  /** Sequences kept per task; 0 keeps all */
  retention?: number;
}

export class DynamoCheckpointStore implements CheckpointStore {
  private readonly tableName: string;
  private readonly retention: number;

  constructor(
    private client: DynamoDBClient,
    opts: DynamoCheckpointStoreOptions,
  ) {
    this.tableName = opts.tableName;
    this.retention = opts.retention ?? 0;
  }

  async ensureTable(): Promise<void> {
    try {
      await this.client.send(new DescribeTableCommand({ TableName: this.tableName }));
    } catch (err: unknown) {
      if (err instanceof Error && err.name === 'ResourceNotFoundException') {
        await this.client.send(
          new CreateTableCommand({
            TableName: this.tableName,
            KeySchema: [
              { AttributeName: PK, KeyType: 'HASH' },
              { AttributeName: SK, KeyType: 'RANGE' },
            ],
            AttributeDefinitions: [
              { AttributeName: PK, AttributeType: 'S' },
              { AttributeName: SK, AttributeType: 'S' },
            ],
            BillingMode: 'PAY_PER_REQUEST',
          }),
        );
      } else {
        throw err;
      }
    }
  }

  async save(checkpoint: Checkpoint): Promise<void> {
    const validated = CheckpointSchema.parse(checkpoint);
    const existing = await this.history(validated.taskId);
    if (planSave(existing, validated, this.retention) === 'skip') return;

    const item: Record<string, AttributeValue> = {
      [PK]: { S: validated.taskId },
      [SK]: { S: sortKey(validated.sequence) },
      timestamp: { S: validated.timestamp },
      state: { S: JSON.stringify(validated.state) },
    };
    if (validated.reason) item.reason = { S: validated.reason };

    try {
      await this.client.send(
        new PutItemCommand({
          TableName: this.tableName,
          Item: item,
          ConditionExpression: `attribute_not_exists(${SK})`,
        }),
      );
    } catch (err: unknown) {
      // Same sequence written concurrently: the save is idempotent
      if (err instanceof Error && err.name === 'ConditionalCheckFailedException') return;
      throw err;
    }

    if (this.retention > 0) {
      const stale = [...existing, validated].slice(0, -this.retention);
      for (const old of stale) {
        await this.client.send(
          new DeleteItemCommand({
            TableName: this.tableName,
            Key: { [PK]: { S: old.taskId }, [SK]: { S: sortKey(old.sequence) } },
          }),
        );
      }
    }
  }

  async load(taskId: string): Promise<Checkpoint | undefined> {
    const result = await this.client.send(
      new QueryCommand({
        TableName: this.tableName,
        KeyConditionExpression: `${PK} = :pk`,
        ExpressionAttributeValues: { ':pk': { S: taskId } },
        ScanIndexForward: false, // newest first
        Limit: 1,
      }),
    );
    const item = result.Items?.[0];
    return item ? fromItem(item) : undefined;
  }

  async history(taskId: string): Promise<Checkpoint[]> {
    const items: Record<string, AttributeValue>[] = [];
    let startKey: Record<string, AttributeValue> | undefined;
    do {
      const result = await this.client.send(
        new QueryCommand({
          TableName: this.tableName,
          KeyConditionExpression: `${PK} = :pk`,
          ExpressionAttributeValues: { ':pk': { S: taskId } },
          ScanIndexForward: true,
          ExclusiveStartKey: startKey,
        }),
      );
      items.push(...(result.Items ?? []));
      startKey = result.LastEvaluatedKey;
    } while (startKey);
    return items.map(fromItem);
  }

  async listTasks(): Promise<string[]> {
    const ids = new Set<string>();
    let startKey: Record<string, AttributeValue> | undefined;
    do {
      const result = await this.client.send(
        new ScanCommand({
          TableName: this.tableName,
          ProjectionExpression: PK,
          ExclusiveStartKey: startKey,
        }),
      );
      for (const item of result.Items ?? []) {
        const id = item[PK]?.S;
        if (id) ids.add(id);
      }
      startKey = result.LastEvaluatedKey;
    } while (startKey);
    return [...ids];
  }
}
