import { AbstractBlockParser, BlockParser } from './block-parser.js';
import { ItemList } from './item-list.js';
import { createLogger } from './log.js';
import { InputLine } from './types.js';

const log = createLogger('section');

// ------ ANYTHING ------
export const NOOP_SECTION_RE = /------ .*/;

export type BlockParserFactory = () => BlockParser;

interface SectionRegistration {
  pattern: RegExp;
  create: BlockParserFactory;
}

export interface SectionParserOptions {
  /** Receives the lines that come before the first recognised header. */
  initialParser?: BlockParser;
  /** Catch-all header, tested after every registered section. */
  noopPattern?: RegExp;
}

/**
 * Ignores its block. Registered for the catch-all header so that unknown
 * sections still end the block in flight.
 */
export class NoopBlockParser implements BlockParser {
  parseBlock(_block: Iterable<InputLine>, _items: ItemList): void {
    // nothing to extract
  }
}

/**
 * Anchor a pattern so it must match a whole line.
 */
function wholeLine(pattern: RegExp): RegExp {
  return new RegExp(`^(?:${pattern.source})$`, pattern.flags.replace(/[gy]/g, ''));
}

/**
 * Splits a stream of lines into sections started by header lines and hands
 * each section's lines to a fresh block parser built by the factory
 * registered for that header.
 *
 * Headers are tested in registration order, most specific first; the
 * catch-all is always tested last. Header lines are not part of their block.
 */
export class SectionParser extends AbstractBlockParser {
  private readonly sections: SectionRegistration[] = [];
  private readonly noop: SectionRegistration;
  private current: BlockParser | undefined;
  private block: string[] = [];

  constructor(options: SectionParserOptions = {}) {
    super();
    this.current = options.initialParser;
    this.noop = {
      pattern: wholeLine(options.noopPattern ?? NOOP_SECTION_RE),
      create: () => new NoopBlockParser(),
    };
  }

  addSection(pattern: RegExp, create: BlockParserFactory): this {
    this.sections.push({ pattern: wholeLine(pattern), create });
    return this;
  }

  parseLine(line: string, items: ItemList): void {
    this.assertOpen();
    const section = this.findSection(line);
    if (!section) {
      if (this.current) {
        this.block.push(line);
      }
      return;
    }
    log.debug(`Section header: ${line}`);
    this.switchParser(section.create, items);
  }

  protected onCommit(items: ItemList): void {
    this.switchParser(undefined, items);
  }

  /**
   * Runs after the previous block parser received its block and before the
   * parser for the next section is created.
   */
  protected onSwitchParser(_previous: BlockParser | undefined): void {
    // hook for subclasses
  }

  private findSection(line: string): SectionRegistration | undefined {
    const match = this.sections.find((section) => section.pattern.test(line));
    if (match) return match;
    return this.noop.pattern.test(line) ? this.noop : undefined;
  }

  private switchParser(create: BlockParserFactory | undefined, items: ItemList): void {
    const previous = this.current;
    if (previous) {
      previous.parseBlock(this.block, items);
    }
    this.block = [];
    this.onSwitchParser(previous);
    this.current = create?.();
  }
}
