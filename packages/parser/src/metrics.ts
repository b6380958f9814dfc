import { getAnrs, getJavaCrashes, getNativeCrashes } from './items.js';
import { createLogger } from './log.js';
import {
  BugreportItem,
  DROPPED_CATEGORIES,
  LogcatItem,
  MemInfoItem,
  MonkeyLogItem,
  ProcrankItem,
} from './types.js';

const log = createLogger('metrics');

/** Flat metric map as reported to a result listener. */
export type MetricMap = Record<string, string>;

/** Metric maps keyed by run name. */
export type MetricRuns = Record<string, MetricMap>;

/**
 * Receives metrics the way a CI test-result listener does: each metric map
 * arrives as an otherwise empty test run.
 */
export interface MetricsListener {
  testRunStarted(runName: string, testCount: number): void;
  testRunEnded(elapsedMs: number, metrics: MetricMap): void;
}

/**
 * Report a metric map by starting and ending an empty test run.
 */
export function reportMetrics(listener: MetricsListener, runName: string, metrics: MetricMap): void {
  log.debug(`Reporting ${Object.keys(metrics).length} metrics for ${runName}`);
  listener.testRunStarted(runName, 0);
  listener.testRunEnded(0, metrics);
}

function putDefined(metrics: MetricMap, key: string, value: number | boolean | undefined): void {
  if (value !== undefined) metrics[key] = String(value);
}

export function memInfoMetrics(item: MemInfoItem): MetricMap {
  const metrics: MetricMap = {};
  for (const [name, kb] of Object.entries(item.values)) {
    metrics[name] = String(kb);
  }
  return metrics;
}

export interface ProcrankMetrics {
  pss: MetricMap;
  rss: MetricMap;
  uss: MetricMap;
}

/**
 * Per-process PSS, RSS and USS keyed by process name, each with a `count`
 * of processes and the `total` across them.
 */
export function procrankMetrics(item: ProcrankItem): ProcrankMetrics {
  const result: ProcrankMetrics = { pss: {}, rss: {}, uss: {} };
  const totals = { pss: 0, rss: 0, uss: 0 };
  let count = 0;

  for (const row of Object.values(item.processes)) {
    if (!row.processName) continue;
    count++;
    for (const key of ['pss', 'rss', 'uss'] as const) {
      totals[key] += row[key];
      result[key][row.processName] = String(row[key]);
    }
  }

  for (const key of ['pss', 'rss', 'uss'] as const) {
    result[key].count = String(count);
    result[key].total = String(totals[key]);
  }
  return result;
}

export function logcatMetrics(item: LogcatItem): MetricMap {
  return {
    anrs: String(getAnrs(item).length),
    javaCrashes: String(getJavaCrashes(item).length),
    nativeCrashes: String(getNativeCrashes(item).length),
    events: String(item.events.length),
  };
}

export function monkeyLogMetrics(item: MonkeyLogItem): MetricMap {
  const metrics: MetricMap = {};
  putDefined(metrics, 'seed', item.seed);
  putDefined(metrics, 'throttle', item.throttle);
  putDefined(metrics, 'targetCount', item.targetCount);
  putDefined(metrics, 'intermediateCount', item.intermediateCount);
  putDefined(metrics, 'finalCount', item.finalCount);
  putDefined(metrics, 'totalDuration', item.totalDuration);
  putDefined(metrics, 'isFinished', item.isFinished);
  putDefined(metrics, 'noActivities', item.noActivities);
  for (const category of DROPPED_CATEGORIES) {
    putDefined(metrics, `dropped.${category}`, item.droppedCounts[category]);
  }
  if (item.crash) {
    metrics.crash = item.crash.type;
    if (item.crash.app !== undefined) metrics.crashApp = item.crash.app;
  }
  return metrics;
}

/**
 * One metric run per section the bugreport contains.
 */
export function bugreportMetrics(item: BugreportItem): MetricRuns {
  const runs: MetricRuns = {};
  if (item.memInfo) {
    runs.meminfo = memInfoMetrics(item.memInfo);
  }
  if (item.procrank) {
    const procrank = procrankMetrics(item.procrank);
    runs['procrank-pss'] = procrank.pss;
    runs['procrank-rss'] = procrank.rss;
    runs['procrank-uss'] = procrank.uss;
  }
  if (item.systemLog) {
    runs.logcat = logcatMetrics(item.systemLog);
  }
  return runs;
}
