import { describe, it, expect } from 'vitest';
import { anrParser, parseAnr } from '../src/anr-parser.js';
import { createAnrItem } from '../src/items.js';

const ANR_LINES = [
  'ANR in com.example.app (com.example.app/.MainActivity)',
  'PID: 1234',
  'Reason: keyDispatchingTimedOut',
  'Load: 0.71 / 0.83 / 0.51',
  'CPU usage from 4357ms to -1ms ago:',
  '  5.8% 312/system_server: 3.4% user + 2.3% kernel / faults: 16 minor',
  '33% TOTAL: 21% user + 11% kernel + 0.3% iowait + 0.1% irq',
  'CPU usage from 100ms to 600ms later:',
  '  40% TOTAL: 30% user + 10% kernel',
];

describe('parseAnr', () => {
  it('should extract every field of an ActivityManager ANR', () => {
    expect(parseAnr(ANR_LINES)).toEqual(
      createAnrItem({
        packageName: 'com.example.app',
        app: 'com.example.app',
        activity: 'com.example.app/.MainActivity',
        reason: 'keyDispatchingTimedOut',
        load1: 0.71,
        load5: 0.83,
        load15: 0.51,
        cpuTotal: 33,
        cpuUser: 21,
        cpuKernel: 11,
        cpuIoWait: 0.3,
        cpuIrq: 0.1,
      })
    );
  });

  it('should accept the long form of the first line', () => {
    const anr = parseAnr([
      'ANR (application not responding) in process: com.example.service',
      'Activity: com.example.service/.Worker',
    ]);
    expect(anr?.packageName).toBe('com.example.service');
    expect(anr?.activity).toBe('com.example.service/.Worker');
  });

  it('should leave the parts missing from the CPU line unset', () => {
    const anr = parseAnr(['ANR in com.example.app', '12% TOTAL: 8% user + 4% kernel']);
    expect(anr?.cpuTotal).toBe(12);
    expect(anr?.cpuUser).toBe(8);
    expect(anr?.cpuKernel).toBe(4);
    expect(anr?.cpuIoWait).toBeUndefined();
    expect(anr?.cpuIrq).toBeUndefined();
  });

  it('should ignore lines before the ANR line', () => {
    const anr = parseAnr(['Reason: too early', 'ANR in com.example.app']);
    expect(anr).toEqual(createAnrItem({ packageName: 'com.example.app', app: 'com.example.app' }));
  });

  it('should return undefined without an ANR line', () => {
    expect(parseAnr([])).toBeUndefined();
    expect(parseAnr(['Reason: keyDispatchingTimedOut'])).toBeUndefined();
  });

  it('should be exposed through the item parser interface', () => {
    expect(anrParser.parse(ANR_LINES)).toEqual(parseAnr(ANR_LINES));
  });
});
