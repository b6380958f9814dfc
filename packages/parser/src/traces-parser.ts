import { AbstractBlockParser } from './block-parser.js';
import { ItemList } from './item-list.js';
import { createTracesItem } from './items.js';
import { ITEM_TYPES, InputLine, TracesItem } from './types.js';

// ============================================================
// Regex Patterns
// ============================================================

// ----- pid 1234 at 2024-01-15 10:00:00 -----
const PID_HEADER_RE = /^----- pid (\d+) at .* -----$/;

// Cmd line: com.example.app
const CMD_LINE_RE = /^Cmd line: (\S+)/;

// "main" prio=5 tid=1 Native
const MAIN_THREAD_RE = /^"main" /;

/**
 * Parses the `VM TRACES AT LAST ANR` section. Extracts the pid, the process
 * name and the main thread's stack (the `"main"` block up to the next blank
 * line). Only the first process dump is read.
 */
export class TracesParser extends AbstractBlockParser {
  private pid: number | undefined;
  private app: string | undefined;
  private stackLines: string[] = [];
  private inMainThread = false;
  private stackDone = false;

  parseLine(line: string, _items: ItemList): void {
    this.assertOpen();
    if (this.stackDone) return;

    if (this.inMainThread) {
      if (line.trim() === '') {
        this.inMainThread = false;
        this.stackDone = true;
      } else {
        this.stackLines.push(line);
      }
      return;
    }

    const pidMatch = line.match(PID_HEADER_RE);
    if (pidMatch && this.pid === undefined) {
      this.pid = parseInt(pidMatch[1], 10);
      return;
    }

    const cmdMatch = line.match(CMD_LINE_RE);
    if (cmdMatch && this.app === undefined) {
      this.app = cmdMatch[1];
      return;
    }

    if (MAIN_THREAD_RE.test(line)) {
      this.inMainThread = true;
      this.stackLines.push(line);
    }
  }

  protected onCommit(items: ItemList): void {
    if (this.pid === undefined && this.app === undefined && this.stackLines.length === 0) {
      return;
    }
    items.addItem(
      createTracesItem({
        pid: this.pid,
        app: this.app,
        stack: this.stackLines.length > 0 ? this.stackLines.join('\n') : undefined,
      })
    );
  }
}

/**
 * Parse a VM traces dump. Returns undefined when nothing was recognised.
 */
export function parseTraces(lines: Iterable<InputLine>): TracesItem | undefined {
  const items = new ItemList();
  new TracesParser().parseBlock(lines, items);
  return items.getFirstItemOfType(ITEM_TYPES.traces);
}
