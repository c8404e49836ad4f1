// Sequence allocation for design numbers
import { ConditionalCheckFailedException } from '@aws-sdk/client-dynamodb';
import { QueryCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import type { QueryCommandInput } from '@aws-sdk/lib-dynamodb';
import type { SequenceKind } from '../../shared/models';
import { dynamoDocClient } from '../../shared/utils/aws-clients';
import { config } from '../../shared/utils/environment';
import { ItemStoreError } from '../../shared/utils/error-handling';
import { DESIGN_ENTITY, albumPartitionKey, formatNPage, parseNPage } from '../../shared/utils/item-keys';

export type SequenceStrategy = 'atomic' | 'max-query';

export interface Sequence {
  /** Returns the next value; `albumId` is required for NPage */
  next(kind: SequenceKind, albumId?: number): Promise<number>;
}

export interface DesignNumbers {
  designId: number;
  nPage: string;
  nGlobalPage: number;
}

function requireAlbum(kind: SequenceKind, albumId: number | undefined): number {
  if (albumId === undefined) {
    throw new ItemStoreError(`allocate ${kind}`, new Error('NPage needs an album id'));
  }
  return albumId;
}

function readNumber(item: Record<string, unknown> | undefined, attribute: string): number | null {
  const value = item?.[attribute];
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    return parseInt(value, 10);
  }
  return null;
}

/**
 * Reads the current maximum and adds one. Two operators allocating at the
 * same time can read the same maximum and collide.
 */
export class MaxQuerySequence implements Sequence {
  async next(kind: SequenceKind, albumId?: number): Promise<number> {
    return (await this.currentMax(kind, albumId)) + 1;
  }

  /**
   * Highest value stored so far, 0 when nothing is stored
   */
  async currentMax(kind: SequenceKind, albumId?: number): Promise<number> {
    const input = this.buildQuery(kind, albumId);

    let items: Record<string, unknown>[] | undefined;
    try {
      const response = await dynamoDocClient.send(new QueryCommand(input));
      items = response.Items;
    } catch (error) {
      throw new ItemStoreError(`query max ${kind}`, error);
    }

    const item = items?.[0];
    if (!item) {
      return 0;
    }

    if (kind === 'NPage') {
      const raw = item['NPage'];
      const parsed = typeof raw === 'string' ? parseNPage(raw) : null;
      if (parsed === null) {
        throw new ItemStoreError(`query max ${kind}`, new Error(`Unexpected NPage value ${String(raw)}`));
      }
      return parsed;
    }

    return readNumber(item, kind) ?? 0;
  }

  private buildQuery(kind: SequenceKind, albumId?: number): QueryCommandInput {
    const common = {
      TableName: config.itemsTable,
      ScanIndexForward: false,
      Limit: 1
    };

    switch (kind) {
      case 'DesignID':
        return {
          ...common,
          IndexName: config.designsByIdIndex,
          KeyConditionExpression: 'EntityType = :et',
          ExpressionAttributeValues: { ':et': DESIGN_ENTITY },
          ProjectionExpression: 'DesignID'
        };
      case 'NGlobalPage':
        return {
          ...common,
          IndexName: config.designsIndex,
          KeyConditionExpression: 'EntityType = :et',
          ExpressionAttributeValues: { ':et': DESIGN_ENTITY },
          ProjectionExpression: 'NGlobalPage'
        };
      case 'NPage':
        return {
          ...common,
          KeyConditionExpression: 'ID = :id',
          ExpressionAttributeValues: { ':id': albumPartitionKey(requireAlbum(kind, albumId)) },
          ProjectionExpression: 'NPage'
        };
    }
  }
}

/**
 * Counter item per sequence, bumped with a single UpdateItem. The counter is
 * seeded from the stored maximum the first time it is used.
 */
export class AtomicCounterSequence implements Sequence {
  constructor(private readonly seedSource: MaxQuerySequence = new MaxQuerySequence()) {}

  static counterKey(kind: SequenceKind, albumId?: number): { ID: string; NPage: string } {
    const id = kind === 'NPage' ? `SEQ#${kind}#${albumPartitionKey(requireAlbum(kind, albumId))}` : `SEQ#${kind}`;
    return { ID: id, NPage: '00000' };
  }

  async next(kind: SequenceKind, albumId?: number): Promise<number> {
    const key = AtomicCounterSequence.counterKey(kind, albumId);

    try {
      const response = await dynamoDocClient.send(new UpdateCommand({
        TableName: config.itemsTable,
        Key: key,
        UpdateExpression: 'SET #v = #v + :one',
        ConditionExpression: 'attribute_exists(#v)',
        ExpressionAttributeNames: { '#v': 'Value' },
        ExpressionAttributeValues: { ':one': 1 },
        ReturnValues: 'UPDATED_NEW'
      }));
      return this.readValue(kind, response.Attributes);
    } catch (error) {
      if (!(error instanceof ConditionalCheckFailedException)) {
        throw error instanceof ItemStoreError ? error : new ItemStoreError(`increment ${kind}`, error);
      }
    }

    // Counter missing: seed it; if_not_exists keeps the first seed written
    const seed = await this.seedSource.currentMax(kind, albumId);
    console.log('Seeding sequence counter', { kind, counter: key.ID, seed });

    try {
      const response = await dynamoDocClient.send(new UpdateCommand({
        TableName: config.itemsTable,
        Key: key,
        UpdateExpression: 'SET #v = if_not_exists(#v, :seed) + :one',
        ExpressionAttributeNames: { '#v': 'Value' },
        ExpressionAttributeValues: { ':seed': seed, ':one': 1 },
        ReturnValues: 'UPDATED_NEW'
      }));
      return this.readValue(kind, response.Attributes);
    } catch (error) {
      throw error instanceof ItemStoreError ? error : new ItemStoreError(`seed ${kind}`, error);
    }
  }

  private readValue(kind: SequenceKind, attributes: Record<string, unknown> | undefined): number {
    const value = readNumber(attributes, 'Value');
    if (value === null) {
      throw new ItemStoreError(`increment ${kind}`, new Error('UpdateItem returned no counter value'));
    }
    return value;
  }
}

export function createSequence(strategy: SequenceStrategy = config.sequenceStrategy): Sequence {
  return strategy === 'max-query' ? new MaxQuerySequence() : new AtomicCounterSequence();
}

/**
 * Allocates design numbers, formatting each per its field convention
 */
export class SequenceAllocator {
  constructor(private readonly sequence: Sequence = createSequence()) {}

  /**
   * Next value as stored: DesignID and NGlobalPage plain, NPage 5-digit
   */
  async allocateNext(kind: SequenceKind, albumId?: number): Promise<string> {
    const value = await this.sequence.next(kind, albumId);
    return kind === 'NPage' ? formatNPage(value) : value.toString();
  }

  async allocateDesignNumbers(albumId: number): Promise<DesignNumbers> {
    const designId = await this.sequence.next('DesignID');
    const nPage = await this.sequence.next('NPage', albumId);
    const nGlobalPage = await this.sequence.next('NGlobalPage');

    console.log('Allocated design numbers', { albumId, designId, nPage, nGlobalPage });

    return { designId, nPage: formatNPage(nPage), nGlobalPage };
  }
}
