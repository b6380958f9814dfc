import { describe, it, expect } from 'vitest';
import { getAnrs, getJavaCrashes, getNativeCrashes } from '../src/items.js';
import { parseLogcat } from '../src/logcat-parser.js';

function line(time: string, pid: number, tid: number, level: string, tag: string, message: string): string {
  return `04-25 ${time}  ${pid}  ${tid} ${level} ${tag}: ${message}`;
}

const NATIVE_MARKER = '*** *** *** *** *** *** *** *** *** *** *** *** *** *** *** ***';

const START = line('17:17:08.445', 312, 366, 'I', 'ActivityManager', 'Start proc com.example.app');
const WORK = line('17:17:09.000', 1234, 1234, 'D', 'ExampleApp', 'doing work');
const ANR = [
  line('17:17:10.000', 312, 366, 'E', 'ActivityManager', 'ANR in com.example.app (com.example.app/.MainActivity)'),
  line('17:17:10.000', 312, 366, 'E', 'ActivityManager', 'Reason: keyDispatchingTimedOut'),
  line('17:17:10.000', 312, 366, 'E', 'ActivityManager', 'Load: 0.71 / 0.83 / 0.51'),
];
const CRASH = [
  line('17:17:11.000', 1234, 1234, 'E', 'AndroidRuntime', 'FATAL EXCEPTION: main'),
  line('17:17:11.000', 1234, 1234, 'E', 'AndroidRuntime', 'Process: com.example.app, PID: 1234'),
  line('17:17:11.000', 1234, 1234, 'E', 'AndroidRuntime', 'java.lang.RuntimeException: boom'),
  line('17:17:11.000', 1234, 1234, 'E', 'AndroidRuntime', '\tat a.b(C.java:1)'),
];

describe('parseLogcat', () => {
  it('should record the first and last timestamps', () => {
    const logcat = parseLogcat([START, WORK, ...ANR], { year: 2012 });

    expect(logcat.startTime).toEqual(new Date(2012, 3, 25, 17, 17, 8, 445));
    expect(logcat.stopTime).toEqual(new Date(2012, 3, 25, 17, 17, 10, 0));
    expect(logcat.yearInferred).toBe(false);
  });

  it('should build an ANR event stamped with its context', () => {
    const logcat = parseLogcat([START, WORK, ...ANR], { year: 2012 });
    const anrs = getAnrs(logcat);

    expect(anrs).toHaveLength(1);
    expect(anrs[0]).toMatchObject({
      app: 'com.example.app',
      activity: 'com.example.app/.MainActivity',
      reason: 'keyDispatchingTimedOut',
      load1: 0.71,
      pid: 312,
      tid: 366,
      eventTime: new Date(2012, 3, 25, 17, 17, 10, 0),
      lastPreamble: `${START}\n${WORK}`,
      processPreamble: START,
    });
  });

  it('should build a Java crash event from AndroidRuntime lines', () => {
    const logcat = parseLogcat([START, WORK, ...ANR, ...CRASH], { year: 2012 });
    const crashes = getJavaCrashes(logcat);

    expect(crashes).toHaveLength(1);
    expect(crashes[0]).toMatchObject({
      app: 'com.example.app',
      exception: 'java.lang.RuntimeException',
      message: 'boom',
      stack: 'java.lang.RuntimeException: boom\n\tat a.b(C.java:1)',
      pid: 1234,
      tid: 1234,
      lastPreamble: [START, WORK, ...ANR].join('\n'),
      processPreamble: WORK,
    });
  });

  it('should build a native crash event from DEBUG lines', () => {
    const logcat = parseLogcat(
      [
        line('17:17:12.000', 99, 99, 'I', 'DEBUG', NATIVE_MARKER),
        line('17:17:12.000', 99, 99, 'I', 'DEBUG', "Build fingerprint: 'test/device:14/TEST'"),
        line('17:17:12.000', 99, 99, 'I', 'DEBUG', 'pid: 1234, tid: 1234  >>> com.example.app <<<'),
      ],
      { year: 2012 }
    );
    const crashes = getNativeCrashes(logcat);

    expect(crashes).toHaveLength(1);
    expect(crashes[0].fingerprint).toBe('test/device:14/TEST');
    expect(crashes[0].app).toBe('com.example.app');
    expect(crashes[0].lastPreamble).toBe('');
  });

  it('should keep back-to-back ANRs from one key apart', () => {
    const logcat = parseLogcat(
      [
        ...ANR,
        line('17:17:20.000', 312, 366, 'E', 'ActivityManager', 'ANR in com.example.app (com.example.app/.MainActivity)'),
        line('17:17:20.000', 312, 366, 'E', 'ActivityManager', 'Reason: Broadcast of Intent'),
      ],
      { year: 2012 }
    );
    const anrs = getAnrs(logcat);

    expect(anrs.map((anr) => anr.reason)).toEqual(['keyDispatchingTimedOut', 'Broadcast of Intent']);
    expect(anrs[1].eventTime).toEqual(new Date(2012, 3, 25, 17, 17, 20, 0));
  });

  it('should keep interleaved records apart by thread', () => {
    const logcat = parseLogcat(
      [
        line('17:17:10.000', 312, 366, 'E', 'ActivityManager', 'ANR in com.example.one'),
        line('17:17:10.000', 312, 400, 'E', 'ActivityManager', 'ANR in com.example.two'),
        line('17:17:10.000', 312, 366, 'E', 'ActivityManager', 'Reason: first'),
        line('17:17:10.000', 312, 400, 'E', 'ActivityManager', 'Reason: second'),
      ],
      { year: 2012 }
    );

    expect(getAnrs(logcat).map((anr) => [anr.app, anr.reason])).toEqual([
      ['com.example.one', 'first'],
      ['com.example.two', 'second'],
    ]);
  });

  it('should read the time format', () => {
    const logcat = parseLogcat(
      [
        '04-25 17:17:10.000 E/ActivityManager(  312): ANR in com.example.app',
        '04-25 17:17:10.000 E/ActivityManager(  312): Reason: keyDispatchingTimedOut',
      ],
      { year: 2012 }
    );
    const anrs = getAnrs(logcat);

    expect(anrs).toHaveLength(1);
    expect(anrs[0].pid).toBe(312);
    expect(anrs[0].tid).toBeUndefined();
    expect(anrs[0].reason).toBe('keyDispatchingTimedOut');
  });

  it('should build a native crash event from padded time format tags', () => {
    const logcat = parseLogcat(
      [
        `04-25 18:33:27.273 I/DEBUG   (  115): ${NATIVE_MARKER}`,
        "04-25 18:33:27.273 I/DEBUG   (  115): Build fingerprint: 'test/device:14/TEST'",
        '04-25 18:33:27.273 I/DEBUG   (  115): pid: 1234, tid: 1234  >>> com.example.app <<<',
      ],
      { year: 2012 }
    );
    const crashes = getNativeCrashes(logcat);

    expect(crashes).toHaveLength(1);
    expect(crashes[0].pid).toBe(115);
    expect(crashes[0].app).toBe('com.example.app');
    expect(crashes[0].eventTime).toEqual(new Date(2012, 3, 25, 18, 33, 27, 273));
  });

  it('should skip lines it cannot parse', () => {
    const logcat = parseLogcat(
      ['--------- beginning of main', '', null, START, 'garbage', WORK],
      { year: 2012 }
    );

    expect(logcat.startTime).toEqual(new Date(2012, 3, 25, 17, 17, 8, 445));
    expect(logcat.stopTime).toEqual(new Date(2012, 3, 25, 17, 17, 9, 0));
    expect(logcat.events).toEqual([]);
  });

  it('should leave the time of an impossible timestamp unset', () => {
    const logcat = parseLogcat(
      ['13-40 17:17:10.000   312   366 E ActivityManager: ANR in com.example.app'],
      { year: 2012 }
    );

    expect(logcat.startTime).toBeUndefined();
    expect(getAnrs(logcat)[0].eventTime).toBeUndefined();
    expect(getAnrs(logcat)[0].app).toBe('com.example.app');
  });

  it('should leave the time of a day past the end of the month unset', () => {
    const logcat = parseLogcat(
      ['02-30 10:00:00.000   312   366 E ActivityManager: ANR in com.example.app'],
      { year: 2013 }
    );

    expect(logcat.startTime).toBeUndefined();
    expect(getAnrs(logcat)[0].eventTime).toBeUndefined();
  });

  it('should bound the preambles by the ring buffer', () => {
    const logcat = parseLogcat([START, WORK, ...ANR.slice(0, 1), ...CRASH], {
      year: 2012,
      ringBufferSize: 2,
    });

    expect(getJavaCrashes(logcat)[0].lastPreamble).toBe(`${WORK}\n${ANR[0]}`);
  });

  it('should limit the process preamble to its own size', () => {
    const logcat = parseLogcat(
      [
        line('17:17:01.000', 1234, 1234, 'D', 'ExampleApp', 'one'),
        line('17:17:02.000', 1234, 1234, 'D', 'ExampleApp', 'two'),
        line('17:17:03.000', 1234, 1234, 'D', 'ExampleApp', 'three'),
        ...CRASH,
      ],
      { year: 2012, processPreambleSize: 2, lastPreambleSize: 1 }
    );
    const crash = getJavaCrashes(logcat)[0];

    expect(crash.processPreamble).toBe(
      [
        line('17:17:02.000', 1234, 1234, 'D', 'ExampleApp', 'two'),
        line('17:17:03.000', 1234, 1234, 'D', 'ExampleApp', 'three'),
      ].join('\n')
    );
    expect(crash.lastPreamble).toBe(line('17:17:03.000', 1234, 1234, 'D', 'ExampleApp', 'three'));
  });

  it('should assume the current year when none is given', () => {
    const logcat = parseLogcat([START], { now: () => new Date(2030, 0, 1) });

    expect(logcat.yearInferred).toBe(true);
    expect(logcat.startTime).toEqual(new Date(2030, 3, 25, 17, 17, 8, 445));
  });

  it('should return an empty item for empty input', () => {
    const logcat = parseLogcat([], { year: 2012 });
    expect(logcat.events).toEqual([]);
    expect(logcat.startTime).toBeUndefined();
  });
});
