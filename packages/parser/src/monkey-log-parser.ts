import { parseAnr } from './anr-parser.js';
import { AbstractBlockParser } from './block-parser.js';
import { ItemList } from './item-list.js';
import { createAnrItem, createJavaCrashItem, createMonkeyLogItem } from './items.js';
import { parseJavaCrash } from './java-crash-parser.js';
import { createLogger } from './log.js';
import {
  AnrItem,
  DROPPED_CATEGORIES,
  DroppedCategory,
  ITEM_TYPES,
  InputLine,
  JavaCrashItem,
  MonkeyLogItem,
} from './types.js';

const log = createLogger('monkey');

// ============================================================
// Regex Patterns
// ============================================================

// adb shell monkey -p com.example.app --throttle 100 -v -v 500
const THROTTLE_RE = /^adb shell monkey.* --throttle (\d+).*$/;
const SECURITY_EXCEPTIONS_RE = /^adb shell monkey.* --ignore-security-exceptions.*$/;

// :Monkey: seed=1000 count=500
const SEED_AND_TARGET_COUNT_RE = /^:Monkey: seed=(\d+) count=(\d+)$/;

const PACKAGE_RE = /^:AllowPackage: (\S+)$/;
const CATEGORY_RE = /^:IncludeCategory: (\S+)$/;

// # Tue Apr 24 17:05:50 PDT 2012 - device uptime = 232.65: Monkey command used for this test:
const START_UPTIME_RE =
  /^# (.*) - device uptime = (\d+\.\d+): Monkey command used for this test:$/;
// # Tue Apr 24 17:06:11 PDT 2012 - device uptime = 253.61: Monkey command ran for: 00:20 (mm:ss)
const STOP_UPTIME_RE =
  /^# (.*) - device uptime = (\d+\.\d+): Monkey command ran for: (\d+):(\d+) \(mm:ss\)$/;

//     // Sending event #100
const INTERMEDIATE_COUNT_RE = /^\s*\/\/ Sending event #(\d+)$/;
const FINISHED_RE = /^\/\/ Monkey finished$/;
const FINAL_COUNT_RE = /^Events injected: (\d+)$/;
const NO_ACTIVITIES_RE = /^\*\* No activities found to run, monkey aborted\.$/;

// :Dropped: keys=0 pointers=0 trackballs=0 flips=0 rotations=0
const DROPPED_RES: Record<DroppedCategory, RegExp> = {
  keys: /^:Dropped: .*keys=(\d+).*$/,
  pointers: /^:Dropped: .*pointers=(\d+).*$/,
  trackballs: /^:Dropped: .*trackballs=(\d+).*$/,
  flips: /^:Dropped: .*flips=(\d+).*$/,
  rotations: /^:Dropped: .*rotations=(\d+).*$/,
};

// // NOT RESPONDING: com.example.app (pid 1234)
const ANR_RE = /^\/\/ NOT RESPONDING: (\S+) \(pid (\d+)\)$/;
// // CRASH: com.example.app (pid 1234)
const JAVA_CRASH_RE = /^\/\/ CRASH: (\S+) \(pid (\d+)\)$/;

const CRASH_LINE_PREFIX_RE = /^\/\/ ?/;

// ============================================================
// Dates
// ============================================================

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

// Offsets from UTC in minutes
const ZONE_OFFSETS: Record<string, number> = {
  UTC: 0,
  GMT: 0,
  PST: -480,
  PDT: -420,
  MST: -420,
  MDT: -360,
  CST: -360,
  CDT: -300,
  EST: -300,
  EDT: -240,
};

// Tue Apr 24 17:05:50 PDT 2012
const DATE_WITH_ZONE_RE = /^\w{3} (\w{3}) +(\d{1,2}) (\d{2}):(\d{2}):(\d{2}) (\S+) (\d{4})$/;
// Wed, 04/25/2012 04:10:39 PM
const DATE_12_HOUR_RE = /^\w{3}, (\d{2})\/(\d{2})\/(\d{4}) (\d{2}):(\d{2}):(\d{2}) ([AP]M)$/i;
// GMT+05:30
const NUMERIC_ZONE_RE = /^(?:GMT|UTC)([+-])(\d{2}):?(\d{2})$/;

function zoneOffset(zone: string): number | undefined {
  if (Object.prototype.hasOwnProperty.call(ZONE_OFFSETS, zone)) return ZONE_OFFSETS[zone];
  const m = zone.match(NUMERIC_ZONE_RE);
  if (!m) return undefined;
  const minutes = parseInt(m[2], 10) * 60 + parseInt(m[3], 10);
  return m[1] === '-' ? -minutes : minutes;
}

function parseDateWithZone(text: string): Date | undefined {
  const m = text.match(DATE_WITH_ZONE_RE);
  if (!m) return undefined;
  const month = MONTHS.indexOf(m[1].toLowerCase());
  if (month < 0) return undefined;
  const [day, hour, minute, second, year] = [m[2], m[3], m[4], m[5], m[7]].map((v) => parseInt(v, 10));

  const utc = new Date(Date.UTC(year, month, day, hour, minute, second));
  if (utc.getUTCMonth() !== month || utc.getUTCDate() !== day) return undefined;

  const offset = zoneOffset(m[6]);
  if (offset === undefined) {
    log.debug(`Unknown time zone ${m[6]}; reading ${text} as local time`);
    return new Date(year, month, day, hour, minute, second);
  }
  return new Date(utc.getTime() - offset * 60 * 1000);
}

function parseDate12Hour(text: string): Date | undefined {
  const m = text.match(DATE_12_HOUR_RE);
  if (!m) return undefined;
  const [month, day, year, hour12, minute, second] = m.slice(1, 7).map((v) => parseInt(v, 10));
  if (month < 1 || month > 12 || hour12 < 1 || hour12 > 12) return undefined;
  const hour = (hour12 % 12) + (m[7].toUpperCase() === 'PM' ? 12 : 0);
  const date = new Date(year, month - 1, day, hour, minute, second);
  if (date.getMonth() !== month - 1 || date.getDate() !== day) return undefined;
  return date;
}

/**
 * Parse a monkey banner date. Tries `EEE MMM dd HH:mm:ss zzz yyyy` first,
 * then `EEE, MM/dd/yyyy hh:mm:ss a`.
 */
export function parseMonkeyTime(text: string): Date | undefined {
  const date = parseDateWithZone(text) ?? parseDate12Hour(text);
  if (!date) {
    log.error(`Could not parse date ${text}`);
  }
  return date;
}

// ============================================================
// Parser
// ============================================================

interface CrashCapture {
  kind: 'anr' | 'javaCrash';
  app: string;
  pid: number;
  lines: string[];
}

/**
 * Reads the output of a monkey run line by line. Anchors are tested
 * independently on every line. After a `// NOT RESPONDING` or `// CRASH`
 * line the following lines are captured up to the next blank line and
 * parsed as an ANR or Java crash.
 */
export class MonkeyLogParser extends AbstractBlockParser {
  private readonly monkeyLog = createMonkeyLogItem();
  private capture: CrashCapture | undefined;

  parseLine(line: string, _items: ItemList): void {
    this.assertOpen();
    if (this.capture) {
      this.continueCapture(this.capture, line);
      return;
    }

    const item = this.monkeyLog;

    const throttle = line.match(THROTTLE_RE);
    if (throttle) {
      item.throttle = parseInt(throttle[1], 10);
    }
    const seed = line.match(SEED_AND_TARGET_COUNT_RE);
    if (seed) {
      item.seed = parseInt(seed[1], 10);
      item.targetCount = parseInt(seed[2], 10);
    }
    if (SECURITY_EXCEPTIONS_RE.test(line)) {
      item.ignoreSecurityExceptions = true;
    }
    const pkg = line.match(PACKAGE_RE);
    if (pkg) {
      item.packages.push(pkg[1]);
    }
    const category = line.match(CATEGORY_RE);
    if (category) {
      item.categories.push(category[1]);
    }
    const start = line.match(START_UPTIME_RE);
    if (start) {
      item.startTime = parseMonkeyTime(start[1]);
      item.startUptimeDuration = Math.round(parseFloat(start[2]) * 1000);
    }
    const stop = line.match(STOP_UPTIME_RE);
    if (stop) {
      item.stopTime = parseMonkeyTime(stop[1]);
      item.stopUptimeDuration = Math.round(parseFloat(stop[2]) * 1000);
      item.totalDuration = parseInt(stop[3], 10) * 60 * 1000 + parseInt(stop[4], 10) * 1000;
    }
    const intermediate = line.match(INTERMEDIATE_COUNT_RE);
    if (intermediate) {
      item.intermediateCount = parseInt(intermediate[1], 10);
    }
    const final = line.match(FINAL_COUNT_RE);
    if (final) {
      item.finalCount = parseInt(final[1], 10);
    }
    if (FINISHED_RE.test(line)) {
      item.isFinished = true;
    }
    if (NO_ACTIVITIES_RE.test(line)) {
      item.noActivities = true;
    }
    for (const dropped of DROPPED_CATEGORIES) {
      const count = line.match(DROPPED_RES[dropped]);
      if (count) {
        item.droppedCounts[dropped] = parseInt(count[1], 10);
      }
    }
    const anr = line.match(ANR_RE);
    if (anr) {
      this.capture = { kind: 'anr', app: anr[1], pid: parseInt(anr[2], 10), lines: [] };
    }
    const crash = line.match(JAVA_CRASH_RE);
    if (crash) {
      this.capture = { kind: 'javaCrash', app: crash[1], pid: parseInt(crash[2], 10), lines: [] };
    }
  }

  protected onCommit(items: ItemList): void {
    if (this.capture) {
      log.warn(`Input ended inside a ${this.capture.kind} capture for ${this.capture.app}`);
      this.flushCapture(this.capture);
    }
    items.addItem(this.monkeyLog);
  }

  private continueCapture(capture: CrashCapture, line: string): void {
    const content = capture.kind === 'javaCrash' ? line.replace(CRASH_LINE_PREFIX_RE, '') : line;
    if (content.trim() === '') {
      this.flushCapture(capture);
      return;
    }
    capture.lines.push(content);
  }

  private flushCapture(capture: CrashCapture): void {
    let crash: AnrItem | JavaCrashItem;
    if (capture.kind === 'anr') {
      crash = parseAnr(capture.lines) ?? createAnrItem();
    } else {
      crash = parseJavaCrash(capture.lines) ?? createJavaCrashItem();
    }
    crash.pid = capture.pid;
    crash.app = capture.app;
    this.monkeyLog.crash = crash;
    this.capture = undefined;
  }
}

/**
 * Parse the output of one monkey run.
 */
export function parseMonkeyLog(lines: Iterable<InputLine>): MonkeyLogItem {
  const items = new ItemList();
  new MonkeyLogParser().parseBlock(lines, items);
  return items.getFirstItemOfType(ITEM_TYPES.monkeyLog) ?? createMonkeyLogItem();
}

// ============================================================
// Run validation
// ============================================================

/** Slack allowed between device uptime and the reported run duration. */
export const UPTIME_BUFFER_MS = 15 * 1000;

/** Events that may go missing before a finished run counts as miscounted. */
export const MAX_MISSING_EVENTS = 100;

/**
 * Check a parsed monkey run for the signs of a broken run. Returns one
 * message per problem; an empty list means the run looks valid.
 */
export function validateMonkeyRun(item: MonkeyLogItem): string[] {
  if (item.noActivities) return [];

  const problems: string[] = [];
  const { startUptimeDuration, stopUptimeDuration, totalDuration } = item;
  if (
    startUptimeDuration === undefined ||
    stopUptimeDuration === undefined ||
    totalDuration === undefined
  ) {
    if (startUptimeDuration === undefined) problems.push('Start uptime is missing');
    if (stopUptimeDuration === undefined) problems.push('Stop uptime is missing');
    if (totalDuration === undefined) problems.push('Total duration is missing');
    return problems;
  }

  if (stopUptimeDuration - startUptimeDuration <= totalDuration - UPTIME_BUFFER_MS) {
    problems.push('Uptime failure');
  }

  if (
    item.isFinished &&
    (item.targetCount ?? 0) - (item.intermediateCount ?? 0) > MAX_MISSING_EVENTS
  ) {
    problems.push('False count');
  }

  if (!item.isFinished && item.finalCount === undefined) {
    problems.push('Missing count');
  }

  return problems;
}
