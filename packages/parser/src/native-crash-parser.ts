import { createNativeCrashItem } from './items.js';
import { InputLine, ItemParser, NativeCrashItem } from './types.js';

// ============================================================
// Regex Patterns
// ============================================================

// *** *** *** *** *** *** *** *** *** *** *** *** *** *** *** ***
export const NATIVE_CRASH_START_RE = /^(?:\*\*\* ){15}\*\*\*$/;

// Build fingerprint: 'google/device/device:14/UP1A/123:userdebug/dev-keys'
const FINGERPRINT_RE = /^Build fingerprint: '(.*)'$/;

// pid: 1234, tid: 1250, name: RenderThread  >>> com.example.app <<<
const APP_RE = /^pid: \d+, tid: \d+(?:, name: .+?)?  >>> (\S+) <<<$/;

/**
 * Parse a tombstone as printed by debuggerd. Lines before the last start
 * marker belong to something else and are dropped.
 */
export function parseNativeCrash(lines: Iterable<InputLine>): NativeCrashItem | undefined {
  let crash: NativeCrashItem | undefined;
  let stack: string[] = [];

  for (const line of lines) {
    if (line === null || line === undefined) continue;

    if (NATIVE_CRASH_START_RE.test(line)) {
      crash = createNativeCrashItem();
      stack = [];
    }
    if (!crash) continue;

    const fingerprint = line.match(FINGERPRINT_RE);
    if (fingerprint) crash.fingerprint = fingerprint[1];

    const app = line.match(APP_RE);
    if (app) crash.app = app[1];

    stack.push(line);
  }

  if (crash) {
    crash.stack = stack.join('\n').trim();
  }
  return crash;
}

export const nativeCrashParser: ItemParser<NativeCrashItem | undefined> = {
  parse: parseNativeCrash,
};
