import { join } from 'node:path';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import type { CheckpointConfig } from '../types/index.js';
import { DynamoCheckpointStore, JsonCheckpointStore, MemoryCheckpointStore } from '../checkpoint/index.js';
import type { CheckpointStore } from '../checkpoint/index.js';
import { JsonAuditStore } from '../audit/index.js';
import type { AuditStore } from '../audit/index.js';

export function checkpointDir(home: string): string {
  return join(home, 'checkpoints');
}

export function auditPath(home: string): string {
  return join(home, 'audit.json');
}

/** The checkpoint store `config.store` names, rooted at the tierflow home. */
export async function createCheckpointStore(config: CheckpointConfig, home: string): Promise<CheckpointStore> {
  switch (config.store) {
    case 'memory':
      return new MemoryCheckpointStore(config.retention);
    case 'json':
      return new JsonCheckpointStore(checkpointDir(home), config.retention);
    case 'dynamo': {
      const store = new DynamoCheckpointStore(new DynamoDBClient({ region: config.awsRegion }), {
        tableName: config.dynamoTable,
        retention: config.retention,
      });
      await store.ensureTable();
      return store;
    }
  }
}

export function createAuditStore(home: string): AuditStore {
  return new JsonAuditStore(auditPath(home));
}
