import { AbstractBlockParser } from './block-parser.js';
import { ItemList } from './item-list.js';
import { createProcrankItem } from './items.js';
import { createLogger } from './log.js';
import { ITEM_TYPES, InputLine, ProcrankItem, ProcrankRow } from './types.js';

const log = createLogger('procrank');

// ============================================================
// Regex Patterns
// ============================================================

//                            ------   ------   ------
const TABLE_END_RE = /^\s*-{6,}(?:\s+-{6,}){2,}\s*$/;

// 1024b, 5K, 2m, 300
const MEM_VALUE_RE = /^(\d+)([bkmg])?$/i;

const UNIT_FACTORS: Record<string, (value: number) => number> = {
  b: (value) => Math.floor(value / 1024),
  k: (value) => value,
  m: (value) => value * 1024,
  g: (value) => value * 1024 * 1024,
};

const MEMORY_COLUMNS = ['vss', 'rss', 'pss', 'uss'] as const;
type MemoryColumn = (typeof MEMORY_COLUMNS)[number];

interface ColumnLayout {
  count: number;
  pid: number;
  memory: Record<MemoryColumn, number>;
}

/**
 * Parse a procrank memory value into KB. A value without a unit suffix is
 * already in KB. Returns undefined when the value is not a number.
 */
export function parseMem(value: string): number | undefined {
  const m = value.trim().match(MEM_VALUE_RE);
  if (!m) return undefined;
  const amount = parseInt(m[1], 10);
  const unit = (m[2] ?? 'k').toLowerCase();
  return UNIT_FACTORS[unit](amount);
}

/**
 * Split on whitespace into at most `limit` fields; the last field keeps the
 * rest of the line, inner spaces included.
 */
function splitFields(line: string, limit: number): string[] {
  const fields: string[] = [];
  let rest = line.trim();
  while (rest.length > 0 && fields.length < limit - 1) {
    const m = rest.match(/^(\S+)\s*(.*)$/);
    if (!m) break;
    fields.push(m[1]);
    rest = m[2];
  }
  if (rest.length > 0) fields.push(rest);
  return fields;
}

function resolveLayout(header: string[]): ColumnLayout | undefined {
  const index = (name: string) => header.findIndex((col) => col.toLowerCase() === name);
  const pid = index('pid');
  const memory = {
    vss: index('vss'),
    rss: index('rss'),
    pss: index('pss'),
    uss: index('uss'),
  };
  if (pid < 0 || MEMORY_COLUMNS.some((col) => memory[col] < 0)) {
    return undefined;
  }
  return { count: header.length, pid, memory };
}

/**
 * Parses the table printed by `procrank`:
 *
 *   PID      Vss      Rss      Pss      Uss  cmdline
 *   178   87136K   81684K   52829K   50012K  system_server
 *   ...
 *                            ------   ------   ------
 *
 * The first non-blank line is the header. The last column is the command
 * line, which may contain spaces.
 */
export class ProcrankParser extends AbstractBlockParser {
  private layout: ColumnLayout | undefined;
  private headerSeen = false;
  private finished = false;
  private readonly processes: Record<number, ProcrankRow> = {};

  parseLine(line: string, _items: ItemList): void {
    this.assertOpen();
    if (this.finished || line.trim() === '') return;

    if (TABLE_END_RE.test(line)) {
      this.finished = true;
      return;
    }

    if (!this.headerSeen) {
      this.headerSeen = true;
      this.layout = resolveLayout(line.trim().split(/\s+/));
      if (!this.layout) {
        log.warn(`Unrecognised procrank header: ${line}`);
        this.finished = true;
      }
      return;
    }

    const layout = this.layout;
    if (!layout) return;

    const fields = splitFields(line, layout.count);
    if (fields.length !== layout.count) {
      log.warn(`Expected ${layout.count} procrank fields, got ${fields.length}: ${line}`);
      return;
    }

    const row = this.parseRow(fields, layout);
    if (!row) {
      log.warn(`Could not parse procrank row: ${line}`);
      return;
    }
    this.processes[row.pid] = row.values;
  }

  protected onCommit(items: ItemList): void {
    if (!this.layout) return;
    items.addItem(createProcrankItem({ processes: this.processes }));
  }

  private parseRow(
    fields: string[],
    layout: ColumnLayout
  ): { pid: number; values: ProcrankRow } | undefined {
    const pidField = fields[layout.pid];
    if (!/^\d+$/.test(pidField)) return undefined;

    const vss = parseMem(fields[layout.memory.vss]);
    const rss = parseMem(fields[layout.memory.rss]);
    const pss = parseMem(fields[layout.memory.pss]);
    const uss = parseMem(fields[layout.memory.uss]);
    if (vss === undefined || rss === undefined || pss === undefined || uss === undefined) {
      return undefined;
    }

    return {
      pid: parseInt(pidField, 10),
      values: { processName: fields[layout.count - 1], vss, rss, pss, uss },
    };
  }
}

/**
 * Parse a procrank table. Returns undefined when no header line was found.
 */
export function parseProcrank(lines: Iterable<InputLine>): ProcrankItem | undefined {
  const items = new ItemList();
  new ProcrankParser().parseBlock(lines, items);
  return items.getFirstItemOfType(ITEM_TYPES.procrank);
}
