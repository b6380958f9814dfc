import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { open, Entry } from 'yauzl-promise';
import { splitLines } from './block-parser.js';
import { createLogger } from './log.js';

const log = createLogger('unpacker');

/**
 * Thrown when a bugreport zip has no main bugreport text entry.
 */
export class BugreportArchiveError extends Error {
  constructor(readonly zipPath: string, readonly entries: string[]) {
    super(`No main bugreport text file found in ${zipPath}. Files: ${entries.join(', ')}`);
    this.name = 'BugreportArchiveError';
  }
}

export interface UnpackResult {
  /** Name of the zip entry the lines were read from. */
  mainEntry: string;
  lines: string[];
  /** Every file entry of the archive, in archive order. */
  entries: string[];
}

/**
 * Read a text file into lines.
 */
export async function readLines(path: string): Promise<string[]> {
  const content = await readFile(path, 'utf-8');
  return splitLines(content);
}

/**
 * Open a bugreport.zip and read its main bugreport text.
 */
export async function unpackBugreport(zipPath: string): Promise<UnpackResult> {
  const zipFile = await open(zipPath);
  const entries: string[] = [];
  let mainEntry: string | undefined;
  let mainContent = '';

  try {
    for await (const entry of zipFile) {
      const fileName = entry.filename;

      // Skip directories
      if (fileName.endsWith('/')) continue;
      entries.push(fileName);

      if (mainEntry === undefined && isMainBugreportFile(fileName)) {
        mainEntry = fileName;
        mainContent = (await readEntry(entry)).toString('utf-8');
      }
    }
  } finally {
    await zipFile.close();
  }

  if (mainEntry === undefined) {
    throw new BugreportArchiveError(zipPath, entries);
  }

  log.info(`Read ${mainEntry} from ${zipPath} (${entries.length} entries)`);
  return { mainEntry, lines: splitLines(mainContent), entries };
}

/**
 * Load bugreport lines from either a `.zip` or a plain text file.
 */
export async function loadBugreportLines(path: string): Promise<string[]> {
  if (extname(path).toLowerCase() === '.zip') {
    const result = await unpackBugreport(path);
    return result.lines;
  }
  return readLines(path);
}

/**
 * Read a zip entry into a Buffer.
 */
async function readEntry(entry: Entry): Promise<Buffer> {
  const stream = await entry.openReadStream();
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

/**
 * Check if a filename is the main bugreport text file.
 * Matches: bugreport-DEVICE-DATE.txt or bugreport.txt at any nesting level.
 */
export function isMainBugreportFile(fileName: string): boolean {
  const base = fileName.split('/').pop() ?? '';
  return /^bugreport.*\.txt$/.test(base) && !base.includes('mini');
}
