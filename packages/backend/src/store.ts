import { BugreportItem, LogcatItem, MetricRuns, MonkeyLogItem } from '@brillopad/parser';

export type ParseKind = 'bugreport' | 'logcat' | 'monkey';

export const PARSE_KINDS: readonly ParseKind[] = ['bugreport', 'logcat', 'monkey'];

export interface ParseResult {
  id: string;
  kind: ParseKind;
  item: BugreportItem | LogcatItem | MonkeyLogItem;
  metrics: MetricRuns;
  /** Run-health problems; only set for monkey logs. */
  problems?: string[];
}

/**
 * Simple in-memory store for parse results.
 * Keyed by upload ID. Entries expire after `ttlMs`.
 */
export class ResultStore {
  private store = new Map<string, { result: ParseResult; timestamp: number }>();

  constructor(private readonly ttlMs: number = 60 * 60 * 1000) {}

  set(id: string, result: ParseResult): void {
    this.store.set(id, { result, timestamp: Date.now() });
    this.cleanup();
  }

  get(id: string): ParseResult | undefined {
    const entry = this.store.get(id);
    if (!entry) return undefined;
    if (Date.now() - entry.timestamp > this.ttlMs) {
      this.store.delete(id);
      return undefined;
    }
    return entry.result;
  }

  get size(): number {
    return this.store.size;
  }

  private cleanup(): void {
    const now = Date.now();
    for (const [key, entry] of this.store) {
      if (now - entry.timestamp > this.ttlMs) {
        this.store.delete(key);
      }
    }
  }
}
