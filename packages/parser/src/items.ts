import {
  AnrItem,
  BugreportItem,
  ITEM_TYPES,
  Item,
  ItemType,
  JavaCrashItem,
  LogcatEvent,
  LogcatItem,
  MemInfoItem,
  MonkeyLogItem,
  NativeCrashItem,
  ProcrankItem,
  SystemPropsItem,
  TracesItem,
} from './types.js';

// ============================================================
// Errors
// ============================================================

/**
 * Thrown when two items disagree on a field and therefore cannot be merged.
 */
export class ConflictingItemError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConflictingItemError';
  }
}

/**
 * Thrown when an attribute outside an item type's closed set is written.
 */
export class UnknownAttributeError extends Error {
  constructor(readonly itemType: ItemType, readonly attribute: string) {
    super(`Attribute "${attribute}" is not allowed on ${itemType} items`);
    this.name = 'UnknownAttributeError';
  }
}

// ============================================================
// Attribute sets
// ============================================================

type AttributeName<T extends Item> = Exclude<keyof T, 'type'> & string;

const EVENT_ATTRIBUTES = [
  'eventTime',
  'pid',
  'tid',
  'app',
  'lastPreamble',
  'processPreamble',
] as const;

export const ITEM_ATTRIBUTES = {
  [ITEM_TYPES.anr]: [
    ...EVENT_ATTRIBUTES,
    'packageName', 'activity', 'reason',
    'cpuTotal', 'cpuUser', 'cpuKernel', 'cpuIoWait', 'cpuIrq',
    'load1', 'load5', 'load15', 'trace',
  ],
  [ITEM_TYPES.javaCrash]: [...EVENT_ATTRIBUTES, 'exception', 'message', 'stack', 'causeStacks'],
  [ITEM_TYPES.nativeCrash]: [...EVENT_ATTRIBUTES, 'fingerprint', 'stack'],
  [ITEM_TYPES.procrank]: ['processes'],
  [ITEM_TYPES.memInfo]: ['values'],
  [ITEM_TYPES.systemProps]: ['properties'],
  [ITEM_TYPES.traces]: ['pid', 'app', 'stack'],
  [ITEM_TYPES.logcat]: ['startTime', 'stopTime', 'events', 'yearInferred'],
  [ITEM_TYPES.bugreport]: ['time', 'memInfo', 'procrank', 'systemLog', 'systemProps'],
  [ITEM_TYPES.monkeyLog]: [
    'startTime', 'stopTime', 'packages', 'categories', 'throttle', 'seed',
    'targetCount', 'ignoreSecurityExceptions', 'totalDuration',
    'startUptimeDuration', 'stopUptimeDuration', 'isFinished', 'noActivities',
    'intermediateCount', 'finalCount', 'droppedCounts', 'crash',
  ],
} satisfies { [I in Item as I['type']]: readonly AttributeName<I>[] };

const KNOWN_TYPES: ReadonlySet<string> = new Set(Object.values(ITEM_TYPES));

export function getItemType(item: Item): ItemType {
  return item.type;
}

export function isItem(value: unknown): value is Item {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    typeof value.type === 'string' &&
    KNOWN_TYPES.has(value.type)
  );
}

/**
 * Write a single attribute. The name is checked against the item type's
 * attribute set at run time as well, for callers working from untyped data.
 */
export function setAttribute<T extends Item, K extends AttributeName<T>>(
  item: T,
  name: K,
  value: T[K]
): void {
  const allowed: readonly string[] = ITEM_ATTRIBUTES[item.type];
  if (!allowed.includes(name)) {
    throw new UnknownAttributeError(item.type, name);
  }
  item[name] = value;
}

// ============================================================
// Constructors
// ============================================================

type Fields<T extends Item> = Partial<Omit<T, 'type'>>;

export function createAnrItem(fields: Fields<AnrItem> = {}): AnrItem {
  return { ...fields, type: ITEM_TYPES.anr };
}

export function createJavaCrashItem(fields: Fields<JavaCrashItem> = {}): JavaCrashItem {
  return { ...fields, type: ITEM_TYPES.javaCrash };
}

export function createNativeCrashItem(fields: Fields<NativeCrashItem> = {}): NativeCrashItem {
  return { ...fields, type: ITEM_TYPES.nativeCrash };
}

export function createProcrankItem(fields: Fields<ProcrankItem> = {}): ProcrankItem {
  return { processes: {}, ...fields, type: ITEM_TYPES.procrank };
}

export function createMemInfoItem(fields: Fields<MemInfoItem> = {}): MemInfoItem {
  return { values: {}, ...fields, type: ITEM_TYPES.memInfo };
}

export function createSystemPropsItem(fields: Fields<SystemPropsItem> = {}): SystemPropsItem {
  return { properties: {}, ...fields, type: ITEM_TYPES.systemProps };
}

export function createTracesItem(fields: Fields<TracesItem> = {}): TracesItem {
  return { ...fields, type: ITEM_TYPES.traces };
}

export function createLogcatItem(fields: Fields<LogcatItem> = {}): LogcatItem {
  return { events: [], ...fields, type: ITEM_TYPES.logcat };
}

export function createBugreportItem(fields: Fields<BugreportItem> = {}): BugreportItem {
  return { ...fields, type: ITEM_TYPES.bugreport };
}

export function createMonkeyLogItem(fields: Fields<MonkeyLogItem> = {}): MonkeyLogItem {
  return {
    packages: [],
    categories: [],
    droppedCounts: {},
    ...fields,
    type: ITEM_TYPES.monkeyLog,
  };
}

// ============================================================
// Logcat event accessors
// ============================================================

export function getAnrs(logcat: LogcatItem): AnrItem[] {
  return logcat.events.filter((e): e is AnrItem => e.type === ITEM_TYPES.anr);
}

export function getJavaCrashes(logcat: LogcatItem): JavaCrashItem[] {
  return logcat.events.filter((e): e is JavaCrashItem => e.type === ITEM_TYPES.javaCrash);
}

export function getNativeCrashes(logcat: LogcatItem): NativeCrashItem[] {
  return logcat.events.filter((e): e is NativeCrashItem => e.type === ITEM_TYPES.nativeCrash);
}

export function isLogcatEvent(item: Item): item is LogcatEvent {
  return (
    item.type === ITEM_TYPES.anr ||
    item.type === ITEM_TYPES.javaCrash ||
    item.type === ITEM_TYPES.nativeCrash
  );
}

// ============================================================
// Equality, consistency and merge
// ============================================================

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

function isUnset(value: unknown): value is null | undefined {
  return value === undefined || value === null;
}

/**
 * Deep equality over the values items hold: primitives, dates, arrays and
 * plain records. Unset values (null/undefined) only equal each other.
 */
export function areEqual(a: unknown, b: unknown): boolean {
  if (isUnset(a) || isUnset(b)) return isUnset(a) && isUnset(b);
  if (a instanceof Date || b instanceof Date) {
    return a instanceof Date && b instanceof Date && a.getTime() === b.getTime();
  }
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((value, i) => areEqual(value, b[i]));
  }
  if (isPlainRecord(a) && isPlainRecord(b)) {
    const keys = new Set([...Object.keys(a), ...Object.keys(b)]);
    for (const key of keys) {
      if (!areEqual(a[key], b[key])) return false;
    }
    return true;
  }
  return a === b;
}

/**
 * True when the values could be merged: equal, or at least one is unset.
 */
export function areConsistent(a: unknown, b: unknown): boolean {
  if (isUnset(a) || isUnset(b)) return true;
  try {
    mergeValues(a, b, 'value');
    return true;
  } catch (err) {
    if (err instanceof ConflictingItemError) return false;
    throw err;
  }
}

/**
 * Merge two values of the same field. An unset side yields the other side,
 * items merge recursively and records merge key by key.
 */
export function mergeValues<V>(a: V, b: V, name: string): V {
  if (isUnset(a)) return b;
  if (isUnset(b)) return a;
  if (isItem(a) && isItem(b)) return mergeItems(a, b);
  if (areEqual(a, b)) return a;
  if (isPlainRecord(a) && isPlainRecord(b)) return mergeRecords(a, b, name);
  throw new ConflictingItemError(`Conflicting values for ${name}`);
}

function mergeRecords<T extends object>(a: T, b: T, name: string): T {
  const merged: T = { ...a };
  for (const key in b) {
    merged[key] = mergeValues(a[key], b[key], `${name}.${key}`);
  }
  return merged;
}

/**
 * Combine two items into the one with the most complete information.
 * Neither input is modified.
 *
 * @throws ConflictingItemError if the types differ or any field conflicts.
 */
export function mergeItems<T extends Item>(a: T, b: T): T {
  if (a === b) return a;
  if (a.type !== b.type) {
    throw new ConflictingItemError(`Cannot merge ${a.type} item with ${b.type} item`);
  }
  return mergeRecords(a, b, a.type);
}

/**
 * True iff both items are of the same type and {@link mergeItems} would succeed.
 */
export function isConsistent(a: Item, b: Item | null | undefined): boolean {
  if (!b) return false;
  if (a.type !== b.type) return false;
  try {
    mergeItems(a, b);
    return true;
  } catch (err) {
    if (err instanceof ConflictingItemError) return false;
    throw err;
  }
}
