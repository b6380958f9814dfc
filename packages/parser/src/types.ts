// ============================================================
// Item type tags
// ============================================================

export const ITEM_TYPES = {
  anr: 'ANR',
  javaCrash: 'JAVA CRASH',
  nativeCrash: 'NATIVE CRASH',
  procrank: 'PROCRANK',
  memInfo: 'MEMORY INFO',
  systemProps: 'SYSTEM PROPERTIES',
  traces: 'TRACES',
  logcat: 'LOGCAT',
  bugreport: 'BUGREPORT',
  monkeyLog: 'MONKEY LOG',
} as const;

export type ItemType = (typeof ITEM_TYPES)[keyof typeof ITEM_TYPES];

// ============================================================
// Logcat events
// ============================================================

export interface LogcatEventFields {
  eventTime?: Date;
  pid?: number;
  tid?: number;
  /** App or package name the event belongs to. */
  app?: string;
  /** Last lines of logcat before the event, regardless of process. */
  lastPreamble?: string;
  /** Last lines of logcat before the event from the same pid. */
  processPreamble?: string;
}

export interface AnrItem extends LogcatEventFields {
  type: typeof ITEM_TYPES.anr;
  packageName?: string;
  activity?: string;
  reason?: string;
  cpuTotal?: number;
  cpuUser?: number;
  cpuKernel?: number;
  cpuIoWait?: number;
  cpuIrq?: number;
  load1?: number;
  load5?: number;
  load15?: number;
  /** Main thread stack from the "VM TRACES AT LAST ANR" section. */
  trace?: string;
}

export interface JavaCrashItem extends LogcatEventFields {
  type: typeof ITEM_TYPES.javaCrash;
  exception?: string;
  message?: string;
  stack?: string;
  causeStacks?: string[];
}

export interface NativeCrashItem extends LogcatEventFields {
  type: typeof ITEM_TYPES.nativeCrash;
  fingerprint?: string;
  stack?: string;
}

export type LogcatEvent = AnrItem | JavaCrashItem | NativeCrashItem;

export interface LogcatItem {
  type: typeof ITEM_TYPES.logcat;
  startTime?: Date;
  stopTime?: Date;
  events: LogcatEvent[];
  /** Set when no year was supplied and the current year was assumed. */
  yearInferred?: boolean;
}

// ============================================================
// Bugreport sections
// ============================================================

export interface ProcrankRow {
  processName: string;
  vss: number;  // KB
  rss: number;  // KB
  pss: number;  // KB
  uss: number;  // KB
}

export interface ProcrankItem {
  type: typeof ITEM_TYPES.procrank;
  /** Keyed by pid. */
  processes: Record<number, ProcrankRow>;
}

export interface MemInfoItem {
  type: typeof ITEM_TYPES.memInfo;
  /** "MemFree" → 65420, values in KB */
  values: Record<string, number>;
}

export interface SystemPropsItem {
  type: typeof ITEM_TYPES.systemProps;
  properties: Record<string, string>;
}

export interface TracesItem {
  type: typeof ITEM_TYPES.traces;
  pid?: number;
  app?: string;
  stack?: string;
}

export interface BugreportItem {
  type: typeof ITEM_TYPES.bugreport;
  time?: Date;
  memInfo?: MemInfoItem;
  procrank?: ProcrankItem;
  systemLog?: LogcatItem;
  systemProps?: SystemPropsItem;
}

// ============================================================
// Monkey
// ============================================================

export type DroppedCategory = 'keys' | 'pointers' | 'trackballs' | 'flips' | 'rotations';

export const DROPPED_CATEGORIES: readonly DroppedCategory[] = [
  'keys',
  'pointers',
  'trackballs',
  'flips',
  'rotations',
];

export interface MonkeyLogItem {
  type: typeof ITEM_TYPES.monkeyLog;
  startTime?: Date;
  stopTime?: Date;
  packages: string[];
  categories: string[];
  throttle?: number;
  seed?: number;
  targetCount?: number;
  ignoreSecurityExceptions?: boolean;
  totalDuration?: number;        // ms, from "ran for: MM:SS"
  startUptimeDuration?: number;  // ms of device uptime
  stopUptimeDuration?: number;   // ms of device uptime
  isFinished?: boolean;
  noActivities?: boolean;
  intermediateCount?: number;
  finalCount?: number;
  droppedCounts: Partial<Record<DroppedCategory, number>>;
  crash?: AnrItem | JavaCrashItem;
}

export type Item =
  | AnrItem
  | JavaCrashItem
  | NativeCrashItem
  | LogcatItem
  | ProcrankItem
  | MemInfoItem
  | SystemPropsItem
  | TracesItem
  | BugreportItem
  | MonkeyLogItem;

// ============================================================
// Parser contracts
// ============================================================

/** A line as handed over by a reader; gaps in the source may show up as null. */
export type InputLine = string | null | undefined;

export interface ItemParser<T> {
  parse(lines: Iterable<InputLine>): T;
}
