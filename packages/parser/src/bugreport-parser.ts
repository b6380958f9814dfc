import { AbstractBlockParser, BlockParser } from './block-parser.js';
import { ItemList } from './item-list.js';
import {
  ConflictingItemError,
  createAnrItem,
  createBugreportItem,
  mergeItems,
} from './items.js';
import { createLogger } from './log.js';
import { LogcatParser, LogcatParserOptions } from './logcat-parser.js';
import { ProcrankParser } from './procrank-parser.js';
import { SectionParser } from './section-parser.js';
import { MemInfoParser, SystemPropsParser } from './section-parsers.js';
import { TracesParser } from './traces-parser.js';
import { BugreportItem, ITEM_TYPES, InputLine, LogcatItem, TracesItem } from './types.js';

const log = createLogger('bugreport');

// ============================================================
// Section headers
// ============================================================

const MEM_INFO_SECTION_RE = /------ MEMORY INFO .*/;
const PROCRANK_SECTION_RE = /------ PROCRANK .*/;
const SYSTEM_PROPS_SECTION_RE = /------ SYSTEM PROPERTIES .*/;
const SYSTEM_LOG_SECTION_RE = /------ SYSTEM LOG .*/;
const ANR_TRACES_SECTION_RE = /------ VM TRACES AT LAST ANR .*/;

// == dumpstate: 2024-01-15 10:00:00
const DUMPSTATE_RE = /^== dumpstate: (\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

/**
 * Reads the lines before the first section header for the dumpstate time.
 */
class DumpstateHeaderParser extends AbstractBlockParser {
  time: Date | undefined;

  parseLine(line: string, _items: ItemList): void {
    this.assertOpen();
    const m = line.match(DUMPSTATE_RE);
    if (!m) return;
    const [year, month, day, hour, minute, second] = m.slice(1, 7).map((v) => parseInt(v, 10));
    const time = new Date(year, month - 1, day, hour, minute, second);
    if (time.getMonth() !== month - 1 || time.getDate() !== day) {
      log.error(`Could not parse dumpstate time ${line}`);
      return;
    }
    this.time = time;
  }

  protected onCommit(_items: ItemList): void {
    // the time is read by BugreportParser when the first section starts
  }
}

/**
 * Options for the system log section. `year` is only used when the
 * bugreport has no dumpstate header to take it from.
 */
export type BugreportParserOptions = LogcatParserOptions;

/**
 * Parses a full bugreport into a {@link BugreportItem}: memory info,
 * procrank, system properties and system log sections, with the main thread
 * stack from the last ANR's VM traces attached to the matching ANR.
 */
export class BugreportParser extends SectionParser {
  private time: Date | undefined;

  constructor(private readonly options: BugreportParserOptions = {}) {
    super({ initialParser: new DumpstateHeaderParser() });
    this.addSection(MEM_INFO_SECTION_RE, () => new MemInfoParser())
      .addSection(PROCRANK_SECTION_RE, () => new ProcrankParser())
      .addSection(SYSTEM_PROPS_SECTION_RE, () => new SystemPropsParser())
      .addSection(SYSTEM_LOG_SECTION_RE, () => new LogcatParser(this.logcatOptions()))
      .addSection(ANR_TRACES_SECTION_RE, () => new TracesParser());
  }

  protected onSwitchParser(previous: BlockParser | undefined): void {
    if (previous instanceof DumpstateHeaderParser) {
      this.time = previous.time;
      if (this.time) {
        log.debug(`Dumpstate time ${this.time.toISOString()}`);
      }
    }
  }

  protected onCommit(items: ItemList): void {
    super.onCommit(items);
    items.addItem(this.assemble(items));
  }

  private logcatOptions(): LogcatParserOptions {
    return { ...this.options, year: this.time?.getFullYear() ?? this.options.year };
  }

  private assemble(items: ItemList): BugreportItem {
    const bugreport = createBugreportItem({
      time: this.time,
      memInfo: items.getFirstItemOfType(ITEM_TYPES.memInfo),
      procrank: items.getFirstItemOfType(ITEM_TYPES.procrank),
      systemLog: items.getFirstItemOfType(ITEM_TYPES.logcat),
      systemProps: items.getFirstItemOfType(ITEM_TYPES.systemProps),
    });

    const traces = items.getFirstItemOfType(ITEM_TYPES.traces);
    if (traces && bugreport.systemLog) {
      addAnrTrace(bugreport.systemLog, traces);
    }
    return bugreport;
  }
}

/**
 * Attach the traces stack to the latest ANR of the same app. An ANR that
 * already carries a different trace is left alone.
 */
function addAnrTrace(logcat: LogcatItem, traces: TracesItem): void {
  const { app, stack } = traces;
  if (app === undefined || stack === undefined) return;

  for (let i = logcat.events.length - 1; i >= 0; i--) {
    const event = logcat.events[i];
    if (event.type !== ITEM_TYPES.anr || event.app !== app) continue;
    try {
      logcat.events[i] = mergeItems(event, createAnrItem({ trace: stack }));
    } catch (err) {
      if (!(err instanceof ConflictingItemError)) throw err;
      log.warn(`Not attaching VM traces to ANR in ${app}: ${err.message}`);
    }
    return;
  }
  log.debug(`No ANR found for VM traces of ${app}`);
}

/**
 * Parse a bugreport. Sections that are missing leave the matching field unset.
 */
export function parseBugreport(
  lines: Iterable<InputLine>,
  options: BugreportParserOptions = {}
): BugreportItem {
  const items = new ItemList();
  new BugreportParser(options).parseBlock(lines, items);
  return items.getFirstItemOfType(ITEM_TYPES.bugreport) ?? createBugreportItem();
}
