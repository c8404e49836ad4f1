// Unit tests for board maintenance
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { FakeItemStore, ITEMS_TABLE, pipelineSchemas } from './helpers/fake-item-store';

const mocks = vi.hoisted(() => ({ docSend: vi.fn() }));

vi.mock('../src/shared/utils/aws-clients', () => ({
  dynamoDocClient: { send: mocks.docSend }
}));

import { NotFoundError, PublishError } from '../src/shared/utils/error-handling';
import { EnvAccessTokenProvider, PinterestClient } from '../src/shared/utils/pinterest-client';
import { ProgressChannel } from '../src/shared/utils/progress-tracker';
import {
  buildSeoBoardDescription,
  buildSeoBoardName,
  createBoardsAndCsv,
  renameBoardsFromCsv,
  trimToWordBoundary
} from '../src/stages/board-manager';

let store: FakeItemStore;
let workDir: string;
let fetchMock: ReturnType<typeof vi.fn>;

function client(): PinterestClient {
  return new PinterestClient(new EnvAccessTokenProvider());
}

function messages(progress: ProgressChannel): string[] {
  return progress.drain().map(event => event.message);
}

describe('Board Manager Unit Tests', () => {
  beforeEach(async () => {
    vi.clearAllMocks();
    store = new FakeItemStore(pipelineSchemas());
    mocks.docSend.mockImplementation((command: unknown) => store.send(command));
    fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
    workDir = await fs.mkdtemp(join(tmpdir(), 'boards-'));
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await fs.rm(workDir, { recursive: true, force: true });
  });

  describe('SEO text', () => {
    it('should append the suffix once', () => {
      expect(buildSeoBoardName('Cute Cats')).toBe('Cute Cats Cross Stitch Free');
      expect(buildSeoBoardName('Cats cross stitch free')).toBe('Cats cross stitch free');
      expect(buildSeoBoardName('  ')).toBe('Cross Stitch Free');
    });

    it('should cut long names at a word boundary', () => {
      expect(buildSeoBoardName('Wonderful Winter Landscapes and Snowy Village Scenes'))
        .toBe('Wonderful Winter Landscapes and Snowy Village');
      expect(trimToWordBoundary('abcdefghij', 4)).toBe('abcd');
    });

    it('should describe the album and the site', () => {
      expect(buildSeoBoardDescription('Cats', 'https://patterns.example.com')).toBe(
        'Cross stitch patterns from album Cats. ' +
        'Discover printable cross stitch charts and downloadable PDF patterns at https://patterns.example.com. ' +
        'Perfect for both beginners and experienced stitchers who love detailed embroidery designs.'
      );
      expect(buildSeoBoardDescription('', '')).toBe(
        'Cross stitch patterns from album beautiful counted cross stitch designs. ' +
        'Discover printable cross stitch charts and downloadable PDF patterns at our site. ' +
        'Perfect for both beginners and experienced stitchers who love detailed embroidery designs.'
      );
    });
  });

  describe('createBoardsAndCsv', () => {
    it('should create one board per album and write the CSV', async () => {
      store.seed(ITEMS_TABLE, [
        { ID: 'ALB#0007', NPage: '00000', EntityType: 'ALBUM', Caption: 'Birds' },
        { ID: 'ALB#0012', NPage: '00000', EntityType: 'ALBUM', Caption: '' }
      ]);
      fetchMock
        .mockResolvedValueOnce(new Response('{"id":"b1"}', { status: 201 }))
        .mockResolvedValueOnce(new Response('{"id":"b2"}', { status: 201 }));
      const csvPath = join(workDir, 'AlbumBoards.csv');
      const progress = new ProgressChannel();

      const rows = await createBoardsAndCsv(client(), progress, { csvPath });

      expect(rows).toEqual([
        { albumId: '0007', caption: 'Birds', boardId: 'b1' },
        { albumId: '0012', caption: '', boardId: 'b2' }
      ]);
      expect(await fs.readFile(csvPath, 'utf8')).toBe('AlbumID,AlbumCaption,BoardID\n0007,"Birds",b1\n0012,"",b2\n');
      expect(JSON.parse(fetchMock.mock.calls[1][1].body)).toEqual({
        name: 'Album 0012',
        description: 'Cross-stitch patterns from album 0012: '
      });
      expect(messages(progress)).toContain("Created board 'Birds' (ID=b1) for album 0007.");
    });

    it('should do nothing without albums', async () => {
      const progress = new ProgressChannel();

      expect(await createBoardsAndCsv(client(), progress, { csvPath: join(workDir, 'AlbumBoards.csv') })).toEqual([]);
      expect(fetchMock).not.toHaveBeenCalled();
      expect(messages(progress)).toEqual([
        'Loading albums from the item store...',
        'Found 0 albums.',
        "No albums found with EntityType = 'ALBUM'. Nothing to do."
      ]);
    });

    it('should fail when a created board has no id', async () => {
      store.seed(ITEMS_TABLE, [{ ID: 'ALB#0007', NPage: '00000', EntityType: 'ALBUM', Caption: 'Birds' }]);
      fetchMock.mockResolvedValueOnce(new Response('{}', { status: 201 }));

      await expect(createBoardsAndCsv(client(), new ProgressChannel(), { csvPath: join(workDir, 'AlbumBoards.csv') }))
        .rejects.toBeInstanceOf(PublishError);
    });
  });

  describe('renameBoardsFromCsv', () => {
    it('should patch every board in the CSV', async () => {
      const csvPath = join(workDir, 'AlbumBoards.csv');
      await fs.writeFile(csvPath, 'AlbumID,AlbumCaption,BoardID\n0007,"Birds",b1\n0012,"",b2\n', 'utf8');
      fetchMock.mockImplementation(async () => new Response('{}', { status: 200 }));

      expect(await renameBoardsFromCsv(client(), new ProgressChannel(), { csvPath })).toBe(2);

      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('https://api.pinterest.test/v5/boards/b1');
      expect(init.method).toBe('PATCH');
      expect(JSON.parse(init.body)).toEqual({
        name: 'Birds Cross Stitch Free',
        description: buildSeoBoardDescription('Birds', 'https://patterns.example.com')
      });
      expect(JSON.parse(fetchMock.mock.calls[1][1].body).name).toBe('Cross Stitch Free');
    });

    it('should require the CSV file', async () => {
      await expect(renameBoardsFromCsv(client(), new ProgressChannel(), { csvPath: join(workDir, 'missing.csv') }))
        .rejects.toBeInstanceOf(NotFoundError);
    });

    it('should stop before the next board once cancelled', async () => {
      const csvPath = join(workDir, 'AlbumBoards.csv');
      await fs.writeFile(csvPath, 'AlbumID,AlbumCaption,BoardID\n0007,"Birds",b1\n', 'utf8');
      const controller = new AbortController();
      controller.abort();

      await expect(renameBoardsFromCsv(client(), new ProgressChannel(), { csvPath, signal: controller.signal }))
        .rejects.toMatchObject({ name: 'AbortError' });
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });
});
