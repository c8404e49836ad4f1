// Catalog records in the item store
import { PutCommand, QueryCommand, ScanCommand } from '@aws-sdk/lib-dynamodb';
import type { ScanCommandInput } from '@aws-sdk/lib-dynamodb';
import type { AlbumRecord, DesignRecord } from '../../shared/models';
import { dynamoDocClient } from '../../shared/utils/aws-clients';
import { config } from '../../shared/utils/environment';
import { ItemStoreError } from '../../shared/utils/error-handling';
import { ALBUM_ENTITY, ALBUM_KEY_PREFIX, DESIGN_ENTITY, albumPartitionKey } from '../../shared/utils/item-keys';

export interface DesignRef {
  designId: number;
  albumId: number;
}

/**
 * Item attributes of a design; a missing pin id is stored as ''
 */
export function toDesignItem(record: DesignRecord): Record<string, string | number> {
  return {
    ID: albumPartitionKey(record.albumId),
    NPage: record.nPage,
    AlbumID: record.albumId,
    Caption: record.title,
    Description: record.description,
    DesignID: record.designId,
    EntityType: DESIGN_ENTITY,
    Height: record.height,
    NColors: record.nColors,
    NDownloaded: 0,
    NGlobalPage: record.nGlobalPage,
    Notes: record.notes,
    Width: record.width,
    PinID: record.pinId ?? ''
  };
}

function readString(item: Record<string, unknown>, name: string): string {
  const value = item[name];
  return typeof value === 'string' ? value : '';
}

function readNumber(item: Record<string, unknown>, name: string): number {
  const value = item[name];
  return typeof value === 'number' ? value : 0;
}

/**
 * Design record of a stored item; null when the ids or the page are missing
 */
export function fromDesignItem(item: Record<string, unknown>): DesignRecord | null {
  const albumId = item['AlbumID'];
  const designId = item['DesignID'];
  const nPage = item['NPage'];
  if (typeof albumId !== 'number' || typeof designId !== 'number' || typeof nPage !== 'string') {
    return null;
  }

  const pinId = readString(item, 'PinID');
  return {
    albumId,
    designId,
    nPage,
    nGlobalPage: readNumber(item, 'NGlobalPage'),
    title: readString(item, 'Caption'),
    description: readString(item, 'Description'),
    notes: readString(item, 'Notes'),
    width: readNumber(item, 'Width'),
    height: readNumber(item, 'Height'),
    nColors: readNumber(item, 'NColors'),
    pinId: pinId === '' ? null : pinId
  };
}

/**
 * Unconditioned put; an existing item with the same key is overwritten
 */
export async function putDesignRecord(record: DesignRecord): Promise<void> {
  try {
    await dynamoDocClient.send(new PutCommand({
      TableName: config.itemsTable,
      Item: toDesignItem(record)
    }));
  } catch (error) {
    throw new ItemStoreError('put design', error);
  }

  console.log('Catalog record written', {
    albumId: record.albumId,
    designId: record.designId,
    nPage: record.nPage,
    pinId: record.pinId
  });
}

/**
 * Checks that the album item exists in its partition
 */
export async function albumExists(albumId: number): Promise<boolean> {
  let exclusiveStartKey: Record<string, unknown> | undefined;

  try {
    do {
      const response = await dynamoDocClient.send(new QueryCommand({
        TableName: config.itemsTable,
        KeyConditionExpression: 'ID = :id',
        FilterExpression: 'EntityType = :album',
        ExpressionAttributeValues: { ':id': albumPartitionKey(albumId), ':album': ALBUM_ENTITY },
        ProjectionExpression: 'ID',
        ExclusiveStartKey: exclusiveStartKey
      }));

      if ((response.Items ?? []).length > 0) {
        return true;
      }
      exclusiveStartKey = response.LastEvaluatedKey;
    } while (exclusiveStartKey);
  } catch (error) {
    throw new ItemStoreError('query album', error);
  }

  return false;
}

/**
 * Looks a design up by its id through the design-id index
 */
export async function findDesign(designId: number): Promise<DesignRecord | null> {
  try {
    const response = await dynamoDocClient.send(new QueryCommand({
      TableName: config.itemsTable,
      IndexName: config.designsByIdIndex,
      KeyConditionExpression: 'EntityType = :design AND DesignID = :designId',
      ExpressionAttributeValues: { ':design': DESIGN_ENTITY, ':designId': designId },
      Limit: 1
    }));

    const item = (response.Items ?? [])[0];
    return item ? fromDesignItem(item) : null;
  } catch (error) {
    throw new ItemStoreError('query design', error);
  }
}

async function scanAll(input: ScanCommandInput, operation: string): Promise<Record<string, unknown>[]> {
  const items: Record<string, unknown>[] = [];
  let exclusiveStartKey: Record<string, unknown> | undefined;

  try {
    do {
      const response = await dynamoDocClient.send(new ScanCommand({ ...input, ExclusiveStartKey: exclusiveStartKey }));
      items.push(...(response.Items ?? []));
      exclusiveStartKey = response.LastEvaluatedKey;
    } while (exclusiveStartKey);
  } catch (error) {
    throw new ItemStoreError(operation, error);
  }

  return items;
}

/**
 * All albums, keyed by their 4-digit id
 */
export async function fetchAlbums(): Promise<AlbumRecord[]> {
  const items = await scanAll({
    TableName: config.itemsTable,
    FilterExpression: 'EntityType = :albumType',
    ExpressionAttributeValues: { ':albumType': ALBUM_ENTITY },
    ProjectionExpression: 'ID, Caption, EntityType'
  }, 'scan albums');

  const albums: AlbumRecord[] = [];
  for (const item of items) {
    const id = item['ID'];
    if (typeof id !== 'string' || !id.toUpperCase().startsWith(ALBUM_KEY_PREFIX) || id.length <= ALBUM_KEY_PREFIX.length) {
      continue;
    }
    const caption = item['Caption'];
    albums.push({
      albumId: id.substring(ALBUM_KEY_PREFIX.length),
      caption: typeof caption === 'string' ? caption : ''
    });
  }
  return albums;
}

/**
 * Design and album ids of every design item
 */
export async function fetchDesignRefs(): Promise<DesignRef[]> {
  const items = await scanAll({
    TableName: config.itemsTable,
    FilterExpression: 'EntityType = :et',
    ExpressionAttributeValues: { ':et': DESIGN_ENTITY },
    ProjectionExpression: 'AlbumID, DesignID'
  }, 'scan designs');

  const refs: DesignRef[] = [];
  for (const item of items) {
    const designId = item['DesignID'];
    const albumId = item['AlbumID'];
    if (typeof designId === 'number' && typeof albumId === 'number') {
      refs.push({ designId, albumId });
    }
  }
  return refs;
}
