/// <reference types="jest" />

import type { WorkoutRecord } from '@fitlog/shared';
import { SessionLog } from '../sessionLog';

function makeRecord(overrides: Partial<WorkoutRecord> = {}): WorkoutRecord {
  return {
    date: '2026-03-01',
    activity: 'Cycling',
    duration_minutes: 30,
    calories: 238,
    weight_kg: 70,
    height_cm: 170,
    bmi: 24.22,
    ...overrides,
  };
}

describe('SessionLog', () => {
  it('should start empty', () => {
    const log = new SessionLog();
    expect(log.isEmpty).toBe(true);
    expect(log.size).toBe(0);
    expect(log.latest()).toBeNull();
    expect(log.tail(7)).toEqual([]);
    expect(log.aggregateCaloriesByActivity()).toEqual([]);
  });

  it('should append records in order', () => {
    const log = new SessionLog();
    const first = makeRecord({ duration_minutes: 10 });
    const second = makeRecord({ duration_minutes: 20 });
    log.append(first);
    log.append(second);

    expect(log.isEmpty).toBe(false);
    expect(log.size).toBe(2);
    expect(log.toArray()).toEqual([first, second]);
    expect(log.latest()).toBe(second);
  });

  describe('tail', () => {
    const log = new SessionLog();
    const records = [1, 2, 3, 4].map((n) =>
      makeRecord({ duration_minutes: n * 10 })
    );
    records.forEach((r) => log.append(r));

    it('should return the last n records oldest first', () => {
      expect(log.tail(2).map((r) => r.duration_minutes)).toEqual([30, 40]);
    });

    it('should return everything when n exceeds the size', () => {
      expect(log.tail(10)).toEqual(records);
    });

    it('should return nothing for n <= 0', () => {
      expect(log.tail(0)).toEqual([]);
      expect(log.tail(-3)).toEqual([]);
      expect(log.tail(0.5)).toEqual([]);
    });
  });

  it('should not expose its internal array', () => {
    const log = new SessionLog();
    log.append(makeRecord());
    log.toArray().pop();
    log.tail(1).pop();
    expect(log.size).toBe(1);
  });

  it('should sum calories per activity', () => {
    const log = new SessionLog();
    log.append(makeRecord({ activity: 'Cycling', calories: 238 }));
    log.append(makeRecord({ activity: 'Running', calories: 450 }));
    log.append(makeRecord({ activity: 'Cycling', calories: 100.5 }));

    const totals = log
      .aggregateCaloriesByActivity()
      .sort((a, b) => a.activity.localeCompare(b.activity));

    expect(totals).toEqual([
      { activity: 'Cycling', calories: 338.5 },
      { activity: 'Running', calories: 450 },
    ]);
  });

  it('should round aggregated sums to two decimals', () => {
    const log = new SessionLog();
    log.append(makeRecord({ activity: 'Yoga', calories: 0.1 }));
    log.append(makeRecord({ activity: 'Yoga', calories: 0.2 }));

    expect(log.aggregateCaloriesByActivity()).toEqual([
      { activity: 'Yoga', calories: 0.3 },
    ]);
  });
});
