import { ANR_START_RE, anrParser } from './anr-parser.js';
import { AbstractBlockParser } from './block-parser.js';
import { ItemList } from './item-list.js';
import { createLogcatItem } from './items.js';
import { FATAL_EXCEPTION_RE, javaCrashParser } from './java-crash-parser.js';
import { createLogger } from './log.js';
import { NATIVE_CRASH_START_RE, nativeCrashParser } from './native-crash-parser.js';
import { ITEM_TYPES, InputLine, ItemParser, LogcatEvent, LogcatItem } from './types.js';

const log = createLogger('logcat');

// Threadtime format:
// MM-DD HH:mm:ss.SSS  PID  TID LEVEL TAG: MESSAGE
const THREADTIME_LINE_RE =
  /^(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})\.(\d{3})\s+(\d+)\s+(\d+)\s+([A-Z])\s+(.+?)\s*: (.*)$/;

// Time format:
// MM-DD HH:mm:ss.SSS LEVEL/TAG( PID): MESSAGE
const TIME_LINE_RE =
  /^(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})\.(\d{3})\s+(\w)\/(.+?)\s*\(\s*(\d+)\): (.*)$/;

export const DEFAULT_RING_BUFFER_SIZE = 500;
export const DEFAULT_LAST_PREAMBLE_SIZE = 15;
export const DEFAULT_PROCESS_PREAMBLE_SIZE = 15;

export interface LogcatParserOptions {
  /** Year of the capture. Logcat timestamps carry none. */
  year?: number;
  ringBufferSize?: number;
  lastPreambleSize?: number;
  processPreambleSize?: number;
  /** Clock used to infer the year when none is given. */
  now?: () => Date;
}

interface LogLine {
  time: Date | undefined;
  pid: number;
  tid: number | undefined;
  level: string;
  tag: string;
  message: string;
}

interface BufferedLine {
  pid: number;
  raw: string;
}

/**
 * Which lines build up which kind of event. A line matching `start` always
 * opens a new record, even when one is already open for the same key.
 */
interface EventSource {
  level: string;
  tag: string;
  start: RegExp;
  parser: ItemParser<LogcatEvent | undefined>;
}

const EVENT_SOURCES: readonly EventSource[] = [
  { level: 'E', tag: 'ActivityManager', start: ANR_START_RE, parser: anrParser },
  { level: 'E', tag: 'AndroidRuntime', start: FATAL_EXCEPTION_RE, parser: javaCrashParser },
  { level: 'I', tag: 'DEBUG', start: NATIVE_CRASH_START_RE, parser: nativeCrashParser },
];

interface EventRecord {
  source: EventSource;
  time: Date | undefined;
  pid: number;
  tid: number | undefined;
  lastPreamble: string;
  processPreamble: string;
  lines: string[];
}

function recordKey(line: LogLine): string {
  return line.tid === undefined
    ? `${line.pid}|${line.level}|${line.tag}`
    : `${line.pid}|${line.tid}|${line.level}|${line.tag}`;
}

/**
 * Groups the ActivityManager, AndroidRuntime and DEBUG lines of a logcat into
 * ANR and crash events, and records the lines leading up to each one.
 */
export class LogcatParser extends AbstractBlockParser {
  private readonly year: number;
  private readonly yearInferred: boolean;
  private readonly ringBufferSize: number;
  private readonly lastPreambleSize: number;
  private readonly processPreambleSize: number;

  private readonly ringBuffer: BufferedLine[] = [];
  private readonly openRecords = new Map<string, EventRecord>();
  private readonly records: EventRecord[] = [];
  private startTime: Date | undefined;
  private stopTime: Date | undefined;

  constructor(options: LogcatParserOptions = {}) {
    super();
    const now = options.now ?? (() => new Date());
    this.yearInferred = options.year === undefined;
    this.year = options.year ?? now().getFullYear();
    this.ringBufferSize = options.ringBufferSize ?? DEFAULT_RING_BUFFER_SIZE;
    this.lastPreambleSize = options.lastPreambleSize ?? DEFAULT_LAST_PREAMBLE_SIZE;
    this.processPreambleSize = options.processPreambleSize ?? DEFAULT_PROCESS_PREAMBLE_SIZE;
  }

  parseLine(line: string, _items: ItemList): void {
    this.assertOpen();
    if (line.trim() === '') return;

    const parsed = this.parseLogLine(line);
    if (!parsed) {
      log.debug(`Failed to parse line: ${line}`);
      return;
    }

    if (parsed.time) {
      this.startTime ??= parsed.time;
      this.stopTime = parsed.time;
    }

    const source = EVENT_SOURCES.find((s) => s.level === parsed.level && s.tag === parsed.tag);
    if (source) {
      this.collect(source, parsed);
    }

    this.ringBuffer.push({ pid: parsed.pid, raw: line });
    if (this.ringBuffer.length > this.ringBufferSize) {
      this.ringBuffer.shift();
    }
  }

  protected onCommit(items: ItemList): void {
    items.addItem(this.buildItem());
  }

  private buildItem(): LogcatItem {
    const events: LogcatEvent[] = [];
    for (const record of this.records) {
      const event = record.source.parser.parse(record.lines);
      if (!event) {
        log.debug(`No ${record.source.tag} event in ${record.lines.length} lines from pid ${record.pid}`);
        continue;
      }
      event.eventTime = record.time;
      event.pid = record.pid;
      event.tid = record.tid;
      event.lastPreamble = record.lastPreamble;
      event.processPreamble = record.processPreamble;
      events.push(event);
    }

    return createLogcatItem({
      startTime: this.startTime,
      stopTime: this.stopTime,
      events,
      yearInferred: this.yearInferred,
    });
  }

  private collect(source: EventSource, line: LogLine): void {
    const key = recordKey(line);
    let record = this.openRecords.get(key);
    if (!record || source.start.test(line.message)) {
      record = {
        source,
        time: line.time,
        pid: line.pid,
        tid: line.tid,
        lastPreamble: this.lastPreamble(),
        processPreamble: this.processPreamble(line.pid),
        lines: [],
      };
      this.openRecords.set(key, record);
      this.records.push(record);
    }
    record.lines.push(line.message);
  }

  private lastPreamble(): string {
    return this.ringBuffer
      .slice(-this.lastPreambleSize)
      .map((entry) => entry.raw)
      .join('\n')
      .trim();
  }

  private processPreamble(pid: number): string {
    const preamble: string[] = [];
    for (let i = this.ringBuffer.length - 1; i >= 0; i--) {
      if (preamble.length >= this.processPreambleSize) break;
      const entry = this.ringBuffer[i];
      if (entry.pid === pid) {
        preamble.unshift(entry.raw);
      }
    }
    return preamble.join('\n').trim();
  }

  private parseLogLine(line: string): LogLine | undefined {
    const threadtime = line.match(THREADTIME_LINE_RE);
    if (threadtime) {
      return {
        time: this.parseTime(threadtime.slice(1, 7)),
        pid: parseInt(threadtime[7], 10),
        tid: parseInt(threadtime[8], 10),
        level: threadtime[9],
        tag: threadtime[10],
        message: threadtime[11],
      };
    }

    const time = line.match(TIME_LINE_RE);
    if (time) {
      return {
        time: this.parseTime(time.slice(1, 7)),
        pid: parseInt(time[9], 10),
        tid: undefined,
        level: time[7],
        tag: time[8],
        message: time[10],
      };
    }

    return undefined;
  }

  /**
   * Build a local-time date from [month, day, hour, minute, second, millis].
   */
  private parseTime(parts: string[]): Date | undefined {
    const [month, day, hour, minute, second, millis] = parts.map((p) => parseInt(p, 10));
    if (month < 1 || month > 12 || day < 1 || day > 31 || hour > 23 || minute > 59 || second > 59) {
      log.error(`Could not parse time ${parts.slice(0, 2).join('-')} ${parts.slice(2, 5).join(':')}`);
      return undefined;
    }
    const date = new Date(this.year, month - 1, day, hour, minute, second, millis);
    if (date.getMonth() !== month - 1 || date.getDate() !== day) {
      log.error(`Could not parse time ${parts.slice(0, 2).join('-')} ${parts.slice(2, 5).join(':')}`);
      return undefined;
    }
    return date;
  }
}

/**
 * Parse a full logcat capture.
 */
export function parseLogcat(lines: Iterable<InputLine>, options: LogcatParserOptions = {}): LogcatItem {
  const items = new ItemList();
  new LogcatParser(options).parseBlock(lines, items);
  return items.getFirstItemOfType(ITEM_TYPES.logcat) ?? createLogcatItem();
}
