import { describe, it, expect } from 'vitest';
import { classifyBalance, evaluate } from '../balance-evaluator.js';

const HOUR = 3_600_000;
const MINUTE = 60_000;

describe('evaluate', () => {
  it('reports at target when worked time equals the target', () => {
    const [daily] = evaluate({ todayMs: 8 * HOUR, weekMs: 8 * HOUR }, { dailyMs: 8 * HOUR, weeklyMs: 40 * HOUR });

    expect(daily.remainingMs).toBe(0);
    expect(daily.status).toBe('at');
  });

  it('reports the time left when under target', () => {
    const [daily] = evaluate(
      { todayMs: 6 * HOUR + 30 * MINUTE, weekMs: 6 * HOUR + 30 * MINUTE },
      { dailyMs: 8 * HOUR, weeklyMs: 40 * HOUR }
    );

    expect(daily.remainingMs).toBe(HOUR + 30 * MINUTE);
    expect(daily.status).toBe('under');
  });

  it('reports overtime as a negative remainder', () => {
    const [daily] = evaluate({ todayMs: 9 * HOUR, weekMs: 9 * HOUR }, { dailyMs: 8 * HOUR, weeklyMs: 40 * HOUR });

    expect(daily.remainingMs).toBe(-HOUR);
    expect(daily.status).toBe('over');
  });

  it('returns daily then weekly entries', () => {
    const result = evaluate({ todayMs: 2 * HOUR, weekMs: 45 * HOUR }, { dailyMs: 8 * HOUR, weeklyMs: 40 * HOUR });

    expect(result).toEqual([
      { period: 'daily', workedMs: 2 * HOUR, targetMs: 8 * HOUR, remainingMs: 6 * HOUR, status: 'under' },
      { period: 'weekly', workedMs: 45 * HOUR, targetMs: 40 * HOUR, remainingMs: -5 * HOUR, status: 'over' },
    ]);
  });

  it('handles nothing worked against zero and negative targets', () => {
    const [daily, weekly] = evaluate({ todayMs: 0, weekMs: 0 }, { dailyMs: 0, weeklyMs: -HOUR });

    expect(daily).toMatchObject({ remainingMs: 0, status: 'at' });
    expect(weekly).toMatchObject({ remainingMs: -HOUR, status: 'over' });
  });

  it('keeps large overtime unclamped', () => {
    const [, weekly] = evaluate({ todayMs: 0, weekMs: 3000 * HOUR }, { dailyMs: 8 * HOUR, weeklyMs: 40 * HOUR });

    expect(weekly.remainingMs).toBe(-2960 * HOUR);
    expect(weekly.status).toBe('over');
  });
});

describe('classifyBalance', () => {
  it('maps the sign of the remainder to a status', () => {
    expect(classifyBalance(1)).toBe('under');
    expect(classifyBalance(0)).toBe('at');
    expect(classifyBalance(-0)).toBe('at');
    expect(classifyBalance(-1)).toBe('over');
  });
});
