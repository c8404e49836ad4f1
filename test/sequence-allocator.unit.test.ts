// Unit tests for design number allocation
import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as fc from 'fast-check';
import { FakeItemStore, ITEMS_TABLE, pipelineSchemas } from './helpers/fake-item-store';

const mocks = vi.hoisted(() => ({ docSend: vi.fn() }));

vi.mock('../src/shared/utils/aws-clients', () => ({
  dynamoDocClient: { send: mocks.docSend }
}));

import { ItemStoreError } from '../src/shared/utils/error-handling';
import {
  AtomicCounterSequence,
  MaxQuerySequence,
  SequenceAllocator
} from '../src/stages/sequence-allocator';

let store: FakeItemStore;

function seedAlbum(albumId: string, pages: string[], firstDesignId: number): void {
  store.seed(ITEMS_TABLE, [{ ID: `ALB#${albumId}`, NPage: '00000', EntityType: 'ALBUM', Caption: 'Birds' }]);
  store.seed(ITEMS_TABLE, pages.map((nPage, index) => ({
    ID: `ALB#${albumId}`,
    NPage: nPage,
    EntityType: 'DESIGN',
    DesignID: firstDesignId + index,
    NGlobalPage: firstDesignId + index + 1000
  })));
}

describe('Sequence Allocator Unit Tests', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    store = new FakeItemStore(pipelineSchemas());
    mocks.docSend.mockImplementation((command: unknown) => store.send(command));
  });

  describe('MaxQuerySequence', () => {
    it('should start every sequence at 1 on an empty store', async () => {
      const allocator = new SequenceAllocator(new MaxQuerySequence());

      expect(await allocator.allocateNext('DesignID')).toBe('1');
      expect(await allocator.allocateNext('NGlobalPage')).toBe('1');
      expect(await allocator.allocateNext('NPage', 7)).toBe('00001');
    });

    it('should continue after the highest padded page of the album', async () => {
      seedAlbum('0007', ['00041', '00042', '00009'], 120);
      const allocator = new SequenceAllocator(new MaxQuerySequence());

      expect(await allocator.allocateNext('NPage', 7)).toBe('00043');
    });

    it('should read the highest DesignID through the design index', async () => {
      seedAlbum('0007', ['00001', '00002'], 121);
      seedAlbum('0003', ['00001'], 99);
      const allocator = new SequenceAllocator(new MaxQuerySequence());

      expect(await allocator.allocateNext('DesignID')).toBe('123');
      expect(await allocator.allocateNext('NGlobalPage')).toBe('1123');
    });

    it('should fail with an item store error when NPage is asked for without an album', async () => {
      const allocator = new SequenceAllocator(new MaxQuerySequence());

      await expect(allocator.allocateNext('NPage')).rejects.toBeInstanceOf(ItemStoreError);
      expect(mocks.docSend).not.toHaveBeenCalled();
    });

    it('should wrap query failures', async () => {
      store.failWith = () => new Error('throttled');

      await expect(new MaxQuerySequence().next('DesignID'))
        .rejects.toThrow('Item store query max DesignID failed: throttled');
    });
  });

  describe('AtomicCounterSequence', () => {
    it('should seed a missing counter from the stored maximum', async () => {
      seedAlbum('0007', ['00001', '00002'], 121);
      const sequence = new AtomicCounterSequence();

      expect(await sequence.next('DesignID')).toBe(123);
      expect(store.find(ITEMS_TABLE, { ID: 'SEQ#DesignID', NPage: '00000' })).toEqual({
        ID: 'SEQ#DesignID',
        NPage: '00000',
        Value: 123
      });
    });

    it('should increment an existing counter without querying the maximum', async () => {
      store.seed(ITEMS_TABLE, [{ ID: 'SEQ#NGlobalPage', NPage: '00000', Value: 500 }]);
      const sequence = new AtomicCounterSequence();

      expect(await sequence.next('NGlobalPage')).toBe(501);
      expect(await sequence.next('NGlobalPage')).toBe(502);
      expect(store.commands).toHaveLength(2);
    });

    it('should keep one counter per album for NPage', async () => {
      seedAlbum('0007', ['00042'], 1);
      const sequence = new AtomicCounterSequence();

      expect(await sequence.next('NPage', 7)).toBe(43);
      expect(await sequence.next('NPage', 3)).toBe(1);
      expect(AtomicCounterSequence.counterKey('NPage', 7)).toEqual({ ID: 'SEQ#NPage#ALB#0007', NPage: '00000' });
    });

    it('should wrap errors other than a failed condition', async () => {
      store.failWith = () => new Error('access denied');

      await expect(new AtomicCounterSequence().next('DesignID'))
        .rejects.toThrow('Item store increment DesignID failed: access denied');
    });

    it('should reject NPage without an album before touching the store', async () => {
      await expect(new AtomicCounterSequence().next('NPage')).rejects.toBeInstanceOf(ItemStoreError);
      expect(store.commands).toHaveLength(0);
    });
  });

  describe('allocateDesignNumbers', () => {
    it('should allocate all three numbers for a design', async () => {
      seedAlbum('0007', ['00041', '00042'], 121);
      const allocator = new SequenceAllocator(new AtomicCounterSequence());

      expect(await allocator.allocateDesignNumbers(7)).toEqual({ designId: 123, nPage: '00043', nGlobalPage: 1123 });
      expect(await allocator.allocateDesignNumbers(7)).toEqual({ designId: 124, nPage: '00044', nGlobalPage: 1124 });
    });
  });

  /**
   * **Feature: design-publishing, Property 1: Allocations are strictly increasing without gaps**
   */
  it('should hand out 1..N for N allocations from an empty store', async () => {
    await fc.assert(
      fc.asyncProperty(fc.integer({ min: 1, max: 15 }), async (count) => {
        store = new FakeItemStore(pipelineSchemas());
        const allocator = new SequenceAllocator(new AtomicCounterSequence());

        const values: string[] = [];
        for (let i = 0; i < count; i++) {
          values.push(await allocator.allocateNext('DesignID'));
        }

        expect(values).toEqual(Array.from({ length: count }, (_, i) => (i + 1).toString()));
      }),
      { numRuns: 20 }
    );
  });
});
