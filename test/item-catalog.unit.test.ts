// Unit tests for catalog records in the item store
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { FakeItemStore, ITEMS_TABLE, pipelineSchemas } from './helpers/fake-item-store';

const mocks = vi.hoisted(() => ({ docSend: vi.fn() }));

vi.mock('../src/shared/utils/aws-clients', () => ({
  dynamoDocClient: { send: mocks.docSend }
}));

import type { DesignRecord } from '../src/shared/models';
import { ItemStoreError } from '../src/shared/utils/error-handling';
import {
  albumExists,
  fetchAlbums,
  fetchDesignRefs,
  findDesign,
  fromDesignItem,
  putDesignRecord,
  toDesignItem
} from '../src/stages/item-catalog';

let store: FakeItemStore;

const record: DesignRecord = {
  albumId: 7,
  designId: 123,
  nPage: '00043',
  nGlobalPage: 1123,
  title: 'Blue Bird',
  description: 'A bird on a branch',
  notes: 'Use two strands',
  width: 80,
  height: 60,
  nColors: 12,
  pinId: '987654'
};

describe('Item Catalog Unit Tests', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    store = new FakeItemStore(pipelineSchemas(), 2);
    mocks.docSend.mockImplementation((command: unknown) => store.send(command));
  });

  it('should map a design record to its item attributes', () => {
    expect(toDesignItem({ ...record, pinId: null })).toEqual({
      ID: 'ALB#0007',
      NPage: '00043',
      AlbumID: 7,
      Caption: 'Blue Bird',
      Description: 'A bird on a branch',
      DesignID: 123,
      EntityType: 'DESIGN',
      Height: 60,
      NColors: 12,
      NDownloaded: 0,
      NGlobalPage: 1123,
      Notes: 'Use two strands',
      Width: 80,
      PinID: ''
    });
  });

  it('should overwrite an existing item with the same key', async () => {
    await putDesignRecord(record);
    await putDesignRecord({ ...record, title: 'Red Bird' });

    const items = store.items(ITEMS_TABLE);
    expect(items).toHaveLength(1);
    expect(items[0]['Caption']).toBe('Red Bird');
    expect(items[0]['PinID']).toBe('987654');
  });

  it('should wrap put failures', async () => {
    store.failWith = () => new Error('ProvisionedThroughputExceeded');

    await expect(putDesignRecord(record)).rejects.toBeInstanceOf(ItemStoreError);
  });

  it('should find an album item past the first page of its partition', async () => {
    store.seed(ITEMS_TABLE, [
      { ID: 'ALB#0007', NPage: '00001', EntityType: 'DESIGN', DesignID: 1 },
      { ID: 'ALB#0007', NPage: '00002', EntityType: 'DESIGN', DesignID: 2 },
      { ID: 'ALB#0007', NPage: '00003', EntityType: 'ALBUM', Caption: 'Birds' }
    ]);

    expect(await albumExists(7)).toBe(true);
    expect(await albumExists(8)).toBe(false);
  });

  it('should fetch albums across scan pages and skip malformed ids', async () => {
    store.seed(ITEMS_TABLE, [
      { ID: 'ALB#0007', NPage: '00000', EntityType: 'ALBUM', Caption: 'Birds' },
      { ID: 'ALB#0007', NPage: '00001', EntityType: 'DESIGN', DesignID: 1 },
      { ID: 'ALB#', NPage: '00000', EntityType: 'ALBUM', Caption: 'Broken' },
      { ID: 'ALB#0012', NPage: '00000', EntityType: 'ALBUM' }
    ]);

    expect(await fetchAlbums()).toEqual([
      { albumId: '0007', caption: 'Birds' },
      { albumId: '0012', caption: '' }
    ]);
  });

  it('should collect numeric design references only', async () => {
    store.seed(ITEMS_TABLE, [
      { ID: 'ALB#0007', NPage: '00000', EntityType: 'ALBUM', Caption: 'Birds' },
      { ID: 'ALB#0007', NPage: '00001', EntityType: 'DESIGN', DesignID: 5, AlbumID: 7 },
      { ID: 'ALB#0007', NPage: '00002', EntityType: 'DESIGN', DesignID: '6', AlbumID: 7 },
      { ID: 'ALB#0003', NPage: '00001', EntityType: 'DESIGN', DesignID: 9, AlbumID: 3 }
    ]);

    expect(await fetchDesignRefs()).toEqual([
      { designId: 5, albumId: 7 },
      { designId: 9, albumId: 3 }
    ]);
  });

  describe('findDesign', () => {
    it('should read a stored design back by its id', async () => {
      await putDesignRecord({ ...record, designId: 122, nPage: '00042' });
      await putDesignRecord(record);

      expect(await findDesign(123)).toEqual(record);
      expect(await findDesign(999)).toBeNull();
    });

    it('should map an empty pin id to null', () => {
      expect(fromDesignItem(toDesignItem({ ...record, pinId: null }))?.pinId).toBeNull();
      expect(fromDesignItem({ AlbumID: 7, NPage: '00043' })).toBeNull();
    });
  });
});
