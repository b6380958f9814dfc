import { ItemList } from './item-list.js';
import { createLogger } from './log.js';
import { InputLine } from './types.js';

const log = createLogger('block');

/**
 * Thrown when a single-use parser instance is fed input after it committed.
 */
export class ParserReuseError extends Error {
  constructor(parserName: string) {
    super(`${parserName} has already committed; create a new instance for each input`);
    this.name = 'ParserReuseError';
  }
}

/**
 * Receives one line at a time. `commit` signals end of input and flushes
 * whatever the parser accumulated into the item list.
 */
export interface LineParser {
  parseLine(line: string, items: ItemList): void;
  commit(items: ItemList): void;
}

/**
 * Receives a whole block of lines at once.
 */
export interface BlockParser {
  parseBlock(block: Iterable<InputLine>, items: ItemList): void;
}

/**
 * Adapts a {@link LineParser} to the {@link BlockParser} interface: feeds
 * every line of the block to `parseLine`, then commits.
 *
 * Instances hold per-input state and are single use.
 */
export abstract class AbstractBlockParser implements BlockParser, LineParser {
  private committed = false;

  parseBlock(block: Iterable<InputLine>, items: ItemList): void {
    this.assertOpen();
    for (const line of block) {
      if (line === null || line === undefined) {
        log.warn('Encountered unexpected null line; skipping');
        continue;
      }
      this.parseLine(line, items);
    }
    this.commit(items);
  }

  commit(items: ItemList): void {
    this.assertOpen();
    this.committed = true;
    this.onCommit(items);
  }

  get isCommitted(): boolean {
    return this.committed;
  }

  protected assertOpen(): void {
    if (this.committed) {
      throw new ParserReuseError(this.constructor.name);
    }
  }

  abstract parseLine(line: string, items: ItemList): void;

  /** Flush accumulated state into the item list. Called exactly once. */
  protected abstract onCommit(items: ItemList): void;
}

/**
 * Split raw text into lines, accepting both `\n` and `\r\n` endings.
 */
export function splitLines(content: string): string[] {
  if (!content) return [];
  return content.split(/\r?\n/);
}
