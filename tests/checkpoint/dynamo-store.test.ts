import { describe, it, expect } from 'vitest';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import type { AttributeValue } from '@aws-sdk/client-dynamodb';
import { DynamoCheckpointStore } from '../../src/checkpoint/index.js';
import { checkpoint } from '../helpers.js';

type Item = Record<string, AttributeValue>;

interface FakeTable {
  client: DynamoDBClient;
  items: Map<string, Item>;
  commands: string[];
  created: boolean;
}

function keyOf(item: Item): string {
  return `${item.pk?.S ?? ''}|${item.sk?.S ?? ''}`;
}

/** A DynamoDB client whose middleware answers every command in process. */
function fakeTable(): FakeTable {
  const client = new DynamoDBClient({
    region: 'us-east-1',
    credentials: { accessKeyId: 'test', secretAccessKey: 'test-secret' },
  });
  const fake: FakeTable = { client, items: new Map(), commands: [], created: false };

  client.middlewareStack.add(
    (_next, context) => async (args) => {
      const name: string = context.commandName ?? 'unknown';
      const input = args.input;
      fake.commands.push(name);
      const $metadata = {};

      if (name === 'DescribeTableCommand' && !fake.created) {
        throw Object.assign(new Error('Requested resource not found'), { name: 'ResourceNotFoundException' });
      }
      if (name === 'CreateTableCommand') fake.created = true;

      if (name === 'PutItemCommand' && 'Item' in input && input.Item) {
        const key = keyOf(input.Item);
        if (fake.items.has(key)) {
          throw Object.assign(new Error('The conditional request failed'), { name: 'ConditionalCheckFailedException' });
        }
        fake.items.set(key, input.Item);
      }

      if (name === 'DeleteItemCommand' && 'Key' in input && input.Key) {
        fake.items.delete(keyOf(input.Key));
      }

      if (name === 'QueryCommand' && 'KeyConditionExpression' in input) {
        const pk = input.ExpressionAttributeValues?.[':pk']?.S;
        const rows = [...fake.items.values()]
          .filter((item) => item.pk?.S === pk)
          .sort((a, b) => (a.sk?.S ?? '').localeCompare(b.sk?.S ?? ''));
        if (input.ScanIndexForward === false) rows.reverse();
        return { output: { $metadata, Items: rows.slice(0, input.Limit ?? rows.length) }, response: {} };
      }

      if (name === 'ScanCommand') {
        return { output: { $metadata, Items: [...fake.items.values()].map((item) => ({ pk: item.pk })) }, response: {} };
      }

      return { output: { $metadata }, response: {} };
    },
    { step: 'initialize', name: 'inProcessTable' },
  );
  return fake;
}

describe('DynamoCheckpointStore', () => {
  it('creates the table when it does not exist', async () => {
    const fake = fakeTable();
    const store = new DynamoCheckpointStore(fake.client, { tableName: 'checkpoints' });

    await store.ensureTable();
    await store.ensureTable();
    expect(fake.commands).toEqual(['DescribeTableCommand', 'CreateTableCommand', 'DescribeTableCommand']);
  });

  it('stores checkpoints under zero-padded sort keys', async () => {
    const fake = fakeTable();
    const store = new DynamoCheckpointStore(fake.client, { tableName: 'checkpoints' });

    await store.save({ ...checkpoint(7, { currentNode: 'qualify' }), reason: 'node succeeded' });

    const [item] = [...fake.items.values()];
    expect(item.sk?.S).toBe('000000000007');
    expect(item.reason?.S).toBe('node succeeded');
    expect(await store.load('t1')).toMatchObject({ sequence: 7, reason: 'node succeeded', state: { currentNode: 'qualify' } });
  });

  it('returns the newest checkpoint and the full history in order', async () => {
    const fake = fakeTable();
    const store = new DynamoCheckpointStore(fake.client, { tableName: 'checkpoints' });
    for (const seq of [1, 2, 10]) await store.save(checkpoint(seq));

    expect((await store.load('t1'))?.sequence).toBe(10);
    expect((await store.history('t1')).map((c) => c.sequence)).toEqual([1, 2, 10]);
  });

  it('skips sequences it already holds and prunes beyond retention', async () => {
    const fake = fakeTable();
    const store = new DynamoCheckpointStore(fake.client, { tableName: 'checkpoints', retention: 2 });
    for (const seq of [1, 2, 3]) await store.save(checkpoint(seq));
    await store.save(checkpoint(3));

    expect((await store.history('t1')).map((c) => c.sequence)).toEqual([2, 3]);
    expect(fake.commands.filter((c) => c === 'PutItemCommand')).toHaveLength(3);
    expect(fake.commands.filter((c) => c === 'DeleteItemCommand')).toHaveLength(1);
  });

  it('lists distinct task ids', async () => {
    const fake = fakeTable();
    const store = new DynamoCheckpointStore(fake.client, { tableName: 'checkpoints' });
    await store.save(checkpoint(0, {}, 'a'));
    await store.save(checkpoint(1, {}, 'a'));
    await store.save(checkpoint(0, {}, 'b'));

    expect(await store.listTasks()).toEqual(['a', 'b']);
  });
});
