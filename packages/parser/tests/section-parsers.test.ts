import { describe, it, expect } from 'vitest';
import { parseMemInfo, parseSystemProps } from '../src/section-parsers.js';
import { parseTraces } from '../src/traces-parser.js';

describe('parseMemInfo', () => {
  it('should map each entry to its value in KB', () => {
    const item = parseMemInfo([
      'MemTotal:         1841664 kB',
      'MemFree:            65420 kB',
      'Active(anon):      412180 kB',
      '',
    ]);

    expect(item.values).toEqual({
      MemTotal: 1841664,
      MemFree: 65420,
      'Active(anon)': 412180,
    });
  });

  it('should skip lines in other shapes', () => {
    const item = parseMemInfo(['MemTotal: 1841664 kB', 'HugePages_Total:       0', 'garbage']);
    expect(item.values).toEqual({ MemTotal: 1841664 });
  });

  it('should return an empty item for an empty section', () => {
    expect(parseMemInfo([]).values).toEqual({});
  });
});

describe('parseSystemProps', () => {
  it('should map each property to its value', () => {
    const item = parseSystemProps([
      '[ro.build.version.sdk]: [34]',
      '[ro.product.model]: [Test Device]',
      '[persist.sys.empty]: []',
    ]);

    expect(item.properties).toEqual({
      'ro.build.version.sdk': '34',
      'ro.product.model': 'Test Device',
      'persist.sys.empty': '',
    });
  });

  it('should skip lines that are not properties', () => {
    const item = parseSystemProps(['', 'not a property', '[a]: [b]']);
    expect(item.properties).toEqual({ a: 'b' });
  });
});

describe('parseTraces', () => {
  const lines = [
    '',
    '----- pid 1234 at 2024-01-15 10:00:00 -----',
    'Cmd line: com.example.app',
    '',
    'DALVIK THREADS:',
    '"main" prio=5 tid=1 Native',
    '  | group="main" sCount=1 dsCount=0',
    '  at java.lang.Object.wait(Native Method)',
    '',
    '"Binder:1234_1" prio=5 tid=8 Native',
    '  at android.os.Binder.execTransact(Binder.java:1)',
    '',
    '----- end 1234 -----',
    '',
    '----- pid 5678 at 2024-01-15 10:00:01 -----',
    'Cmd line: com.example.other',
  ];

  it('should read the pid, process and main thread stack', () => {
    const item = parseTraces(lines);
    expect(item?.pid).toBe(1234);
    expect(item?.app).toBe('com.example.app');
    expect(item?.stack).toBe(
      [
        '"main" prio=5 tid=1 Native',
        '  | group="main" sCount=1 dsCount=0',
        '  at java.lang.Object.wait(Native Method)',
      ].join('\n')
    );
  });

  it('should return undefined when nothing is recognised', () => {
    expect(parseTraces(['', 'nothing to see'])).toBeUndefined();
  });
});
