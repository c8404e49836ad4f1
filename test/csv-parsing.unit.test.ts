// Unit tests for the album board CSV
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  buildBoardCsv,
  formatBoardCsvLine,
  parseBoardCsvFromFile,
  parseBoardCsvFromString,
  toAlbumKey,
  toBoardIndex
} from '../src/shared/utils/csv-parser';

let workDir: string;

describe('Board CSV Unit Tests', () => {
  beforeEach(async () => {
    workDir = await fs.mkdtemp(join(tmpdir(), 'boards-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('should pad numeric album ids to four digits', () => {
    expect(toAlbumKey(7)).toBe('0007');
    expect(toAlbumKey(' 12 ')).toBe('0012');
    expect(toAlbumKey('12345')).toBe('12345');
    expect(toAlbumKey('misc')).toBe('misc');
  });

  it('should quote captions and escape embedded quotes', () => {
    expect(formatBoardCsvLine('0007', 'Say "hi", birds', 'b1')).toBe('0007,"Say ""hi"", birds",b1');
  });

  it('should build the document with the header line', () => {
    expect(buildBoardCsv([])).toBe('AlbumID,AlbumCaption,BoardID\n');
    expect(buildBoardCsv([{ albumId: '0007', caption: 'Birds', boardId: 'b1' }]))
      .toBe('AlbumID,AlbumCaption,BoardID\n0007,"Birds",b1\n');
  });

  it('should parse quoted captions and skip incomplete rows', async () => {
    const content = '\uFEFFAlbumID, AlbumCaption ,BoardID\n0007,"Say ""hi"", birds",b1\n0008,"No board",\n,"No album",b3\n12, Cats ,b4\n';

    expect(await parseBoardCsvFromString(content)).toEqual([
      { albumId: '0007', caption: 'Say "hi", birds', boardId: 'b1' },
      { albumId: '12', caption: 'Cats', boardId: 'b4' }
    ]);
  });

  it('should read columns by position whatever the header says', async () => {
    expect(await parseBoardCsvFromString('Album ID,Caption,Board\n0005,"Roses",b5\n0009,Birds, big and small,b9\n')).toEqual([
      { albumId: '0005', caption: 'Roses', boardId: 'b5' },
      { albumId: '0009', caption: 'Birds, big and small', boardId: 'b9' }
    ]);
  });

  it('should parse what it writes', async () => {
    const rows = [
      { albumId: '0007', caption: 'Birds, big and small', boardId: 'b1' },
      { albumId: '0012', caption: '', boardId: 'b2' }
    ];

    expect(await parseBoardCsvFromString(buildBoardCsv(rows))).toEqual(rows);
  });

  it('should read a file and treat a missing file as empty', async () => {
    const filePath = join(workDir, 'boards.csv');
    await fs.writeFile(filePath, 'AlbumID,AlbumCaption,BoardID\n0003,"Winter",b9\n', 'utf8');
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    expect(await parseBoardCsvFromFile(filePath)).toEqual([{ albumId: '0003', caption: 'Winter', boardId: 'b9' }]);
    expect(await parseBoardCsvFromFile(join(workDir, 'absent.csv'))).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should reject when the file cannot be read', async () => {
    await expect(parseBoardCsvFromFile(workDir)).rejects.toThrow('CSV parsing failed: EISDIR');
  });

  it('should index boards by album key with the first row winning', () => {
    const index = toBoardIndex([
      { albumId: '7', caption: '', boardId: 'first' },
      { albumId: '0007', caption: '', boardId: 'second' },
      { albumId: '0012', caption: '', boardId: 'b12' }
    ]);

    expect([...index.entries()]).toEqual([['0007', 'first'], ['0012', 'b12']]);
  });
});
