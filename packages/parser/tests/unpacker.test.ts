import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { createWriteStream } from 'node:fs';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pipeline } from 'node:stream/promises';
import { ZipFile } from 'yazl';
import {
  BugreportArchiveError,
  isMainBugreportFile,
  loadBugreportLines,
  readLines,
  unpackBugreport,
} from '../src/unpacker.js';

/**
 * Write a zip archive. Names ending in "/" become directories.
 */
async function writeZip(path: string, files: Array<[string, string]>): Promise<void> {
  const zip = new ZipFile();
  for (const [name, content] of files) {
    if (name.endsWith('/')) {
      zip.addEmptyDirectory(name);
    } else {
      zip.addBuffer(Buffer.from(content, 'utf-8'), name);
    }
  }
  zip.end();
  await pipeline(zip.outputStream, createWriteStream(path));
}

const BUGREPORT_TEXT = '== dumpstate: 2012-04-25 17:17:30\r\n------ UPTIME (uptime) ------\r\nup';

let dir: string;

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), 'unpacker-test-'));
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('isMainBugreportFile', () => {
  it('should match bugreport text files at any depth', () => {
    expect(isMainBugreportFile('bugreport.txt')).toBe(true);
    expect(isMainBugreportFile('bugreport-device-2012-04-25.txt')).toBe(true);
    expect(isMainBugreportFile('nested/bugreport-device.txt')).toBe(true);
  });

  it('should reject other files', () => {
    expect(isMainBugreportFile('main_entry.txt')).toBe(false);
    expect(isMainBugreportFile('bugreport.zip')).toBe(false);
    expect(isMainBugreportFile('bugreport-mini.txt')).toBe(false);
    expect(isMainBugreportFile('FS/data/anr/bugreport.log')).toBe(false);
  });
});

describe('unpackBugreport', () => {
  it('should read the main text entry of a zip', async () => {
    const zipPath = join(dir, 'report.zip');
    await writeZip(zipPath, [
      ['FS/', ''],
      ['version.txt', '2.0'],
      ['bugreport-device-2012-04-25.txt', BUGREPORT_TEXT],
      ['bugreport-other.txt', 'ignored'],
    ]);

    const result = await unpackBugreport(zipPath);

    expect(result.mainEntry).toBe('bugreport-device-2012-04-25.txt');
    expect(result.entries).toEqual(['version.txt', 'bugreport-device-2012-04-25.txt', 'bugreport-other.txt']);
    expect(result.lines).toEqual([
      '== dumpstate: 2012-04-25 17:17:30',
      '------ UPTIME (uptime) ------',
      'up',
    ]);
  });

  it('should fail for a zip without a bugreport', async () => {
    const zipPath = join(dir, 'empty.zip');
    await writeZip(zipPath, [['version.txt', '2.0']]);

    await expect(unpackBugreport(zipPath)).rejects.toBeInstanceOf(BugreportArchiveError);
    await expect(unpackBugreport(zipPath)).rejects.toMatchObject({ entries: ['version.txt'] });
  });
});

describe('loadBugreportLines', () => {
  it('should read plain text files', async () => {
    const textPath = join(dir, 'bugreport.txt');
    await writeFile(textPath, BUGREPORT_TEXT);

    expect(await loadBugreportLines(textPath)).toEqual(await readLines(textPath));
    expect(await readLines(textPath)).toHaveLength(3);
  });

  it('should read zips by extension', async () => {
    const zipPath = join(dir, 'REPORT.ZIP');
    await writeZip(zipPath, [['bugreport.txt', 'one\ntwo']]);

    expect(await loadBugreportLines(zipPath)).toEqual(['one', 'two']);
  });

  it('should surface read failures', async () => {
    await expect(loadBugreportLines(join(dir, 'missing.txt'))).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
