import { createJavaCrashItem } from './items.js';
import { createLogger } from './log.js';
import { InputLine, ItemParser, JavaCrashItem } from './types.js';

const log = createLogger('java-crash');

// ============================================================
// Regex Patterns
// ============================================================

// FATAL EXCEPTION: main
export const FATAL_EXCEPTION_RE = /^FATAL EXCEPTION: .*$/;

// Process: com.example.app, PID: 1234
const PROCESS_RE = /^Process: ([^,\s]+), PID: (\d+)$/;

// java.lang.IllegalStateException: Could not execute method of the activity
const EXCEPTION_RE = /^([^\s:]+)(?:: (.*))?$/;

// Caused by: java.lang.NullPointerException
const CAUSED_BY_RE = /^Caused by: /;

/**
 * Parse one Java crash:
 *
 *   FATAL EXCEPTION: main
 *   Process: com.example.app, PID: 1234
 *   java.lang.RuntimeException: boom
 *   \tat com.example.app.Main.run(Main.java:10)
 *   Caused by: java.lang.NullPointerException
 *   \tat com.example.app.Main.init(Main.java:4)
 *
 * `stack` is the exception line plus every line up to the first `Caused by:`;
 * each `Caused by:` group becomes one entry of `causeStacks`.
 */
export function parseJavaCrash(lines: Iterable<InputLine>): JavaCrashItem | undefined {
  let crash: JavaCrashItem | undefined;
  let app: string | undefined;
  const stack: string[] = [];
  const causes: string[][] = [];

  for (const line of lines) {
    if (line === null || line === undefined) continue;

    if (!crash) {
      if (line.trim() === '' || FATAL_EXCEPTION_RE.test(line)) continue;
      const process = line.match(PROCESS_RE);
      if (process) {
        app = process[1];
        continue;
      }
      const exception = line.match(EXCEPTION_RE);
      if (!exception) {
        log.debug(`Skipping line before exception: ${line}`);
        continue;
      }
      crash = createJavaCrashItem({ exception: exception[1], message: exception[2] });
      stack.push(line);
      continue;
    }

    if (CAUSED_BY_RE.test(line)) {
      causes.push([line]);
    } else if (causes.length > 0) {
      causes[causes.length - 1].push(line);
    } else {
      stack.push(line);
    }
  }

  if (!crash) return undefined;

  crash.stack = stack.join('\n').trim();
  if (app !== undefined) crash.app = app;
  if (causes.length > 0) {
    crash.causeStacks = causes.map((cause) => cause.join('\n').trim());
  }
  return crash;
}

export const javaCrashParser: ItemParser<JavaCrashItem | undefined> = { parse: parseJavaCrash };
