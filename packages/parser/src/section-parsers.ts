import { AbstractBlockParser } from './block-parser.js';
import { ItemList } from './item-list.js';
import { createMemInfoItem, createSystemPropsItem } from './items.js';
import { createLogger } from './log.js';
import { ITEM_TYPES, InputLine, MemInfoItem, SystemPropsItem } from './types.js';

const log = createLogger('sections');

// MemFree:           65420 kB
const MEMINFO_LINE_RE = /^([^:]+):\s+(\d+) kB$/;

// [ro.build.version.sdk]: [34]
const PROPERTY_LINE_RE = /^\[(.*)\]: \[(.*)\]$/;

/**
 * Parses the `MEMORY INFO (/proc/meminfo)` section into name → KB.
 */
export class MemInfoParser extends AbstractBlockParser {
  private readonly values: Record<string, number> = {};

  parseLine(line: string, _items: ItemList): void {
    this.assertOpen();
    if (line.trim() === '') return;
    const m = line.match(MEMINFO_LINE_RE);
    if (!m) {
      log.debug(`Skipping meminfo line: ${line}`);
      return;
    }
    this.values[m[1].trim()] = parseInt(m[2], 10);
  }

  protected onCommit(items: ItemList): void {
    items.addItem(createMemInfoItem({ values: this.values }));
  }
}

/**
 * Parses the `SYSTEM PROPERTIES (getprop)` section.
 */
export class SystemPropsParser extends AbstractBlockParser {
  private readonly properties: Record<string, string> = {};

  parseLine(line: string, _items: ItemList): void {
    this.assertOpen();
    if (line.trim() === '') return;
    const m = line.match(PROPERTY_LINE_RE);
    if (!m) {
      log.debug(`Skipping property line: ${line}`);
      return;
    }
    this.properties[m[1]] = m[2];
  }

  protected onCommit(items: ItemList): void {
    items.addItem(createSystemPropsItem({ properties: this.properties }));
  }
}

export function parseMemInfo(lines: Iterable<InputLine>): MemInfoItem {
  const items = new ItemList();
  new MemInfoParser().parseBlock(lines, items);
  return items.getFirstItemOfType(ITEM_TYPES.memInfo) ?? createMemInfoItem();
}

export function parseSystemProps(lines: Iterable<InputLine>): SystemPropsItem {
  const items = new ItemList();
  new SystemPropsParser().parseBlock(lines, items);
  return items.getFirstItemOfType(ITEM_TYPES.systemProps) ?? createSystemPropsItem();
}
