import { createAnrItem } from './items.js';
import { AnrItem, InputLine, ItemParser } from './types.js';

// ============================================================
// Regex Patterns
// ============================================================

// ANR in com.example.app (com.example.app/.MainActivity)
// ANR (application not responding) in process: com.example.app
export const ANR_START_RE =
  /^ANR (?:\(application not responding\) )?in (?:process: )?(\S+)(?: \(([^)\s]+)\))?.*$/;

// Activity: com.example.app/.MainActivity
const ACTIVITY_RE = /^Activity: (.+)$/;

// Reason: keyDispatchingTimedOut
const REASON_RE = /^Reason: (.+)$/;

// Load: 0.71 / 0.83 / 0.51
const LOAD_RE = /^Load: (\d+(?:\.\d+)?) \/ (\d+(?:\.\d+)?) \/ (\d+(?:\.\d+)?)/;

// 33% TOTAL: 21% user + 11% kernel + 0.3% iowait + 0.1% irq
const CPU_TOTAL_RE = /^\s*(\d+(?:\.\d+)?)% TOTAL: (.*)$/;

const CPU_USER_RE = /(\d+(?:\.\d+)?)% user/;
const CPU_KERNEL_RE = /(\d+(?:\.\d+)?)% kernel/;
const CPU_IOWAIT_RE = /(\d+(?:\.\d+)?)% iowait/;
const CPU_IRQ_RE = /(\d+(?:\.\d+)?)% irq/;

function matchNumber(text: string, re: RegExp): number | undefined {
  const m = text.match(re);
  return m ? parseFloat(m[1]) : undefined;
}

/**
 * Parse the ActivityManager lines of one ANR. Every field is optional; the
 * block only has to contain the `ANR in <package>` line.
 */
export function parseAnr(lines: Iterable<InputLine>): AnrItem | undefined {
  let anr: AnrItem | undefined;

  for (const line of lines) {
    if (line === null || line === undefined) continue;

    const start = line.match(ANR_START_RE);
    if (start) {
      anr = createAnrItem({ packageName: start[1], app: start[1] });
      if (start[2]) anr.activity = start[2];
      continue;
    }
    if (!anr) continue;

    const activity = line.match(ACTIVITY_RE);
    if (activity) {
      anr.activity = activity[1].trim();
      continue;
    }

    const reason = line.match(REASON_RE);
    if (reason) {
      anr.reason = reason[1].trim();
      continue;
    }

    const load = line.match(LOAD_RE);
    if (load) {
      anr.load1 = parseFloat(load[1]);
      anr.load5 = parseFloat(load[2]);
      anr.load15 = parseFloat(load[3]);
      continue;
    }

    const cpu = line.match(CPU_TOTAL_RE);
    if (cpu && anr.cpuTotal === undefined) {
      anr.cpuTotal = parseFloat(cpu[1]);
      anr.cpuUser = matchNumber(cpu[2], CPU_USER_RE);
      anr.cpuKernel = matchNumber(cpu[2], CPU_KERNEL_RE);
      anr.cpuIoWait = matchNumber(cpu[2], CPU_IOWAIT_RE);
      anr.cpuIrq = matchNumber(cpu[2], CPU_IRQ_RE);
    }
  }

  return anr;
}

export const anrParser: ItemParser<AnrItem | undefined> = { parse: parseAnr };
