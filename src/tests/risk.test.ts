import { describe, expect, it } from 'vitest';
import { riskPctForConviction, runRiskStage, sizePosition } from '@/plan/risk.ts';
import { InputError, ValidationError } from '@/plan/errors.ts';
import { CONVICTION_LEVELS, compareConviction } from '@/plan/types.ts';
import { RISK } from '@/utils/config.ts';
import { NOW, fixedClock, longAnalyst, makeContext, makeRequest } from './fixtures.ts';
import type { TradingSetup } from '@/plan/types.ts';

const setup = (entry: number, stopLoss: number, takeProfits: number[]): TradingSetup => ({
  symbol: 'ACME',
  direction: entry > stopLoss ? 'LONG' : 'SHORT',
  entry,
  stopLoss,
  takeProfits,
  riskPerShare: Math.abs(entry - stopLoss),
  rewardToRisk: Math.abs(takeProfits[0] - entry) / Math.abs(entry - stopLoss),
  chartStructure: '',
  rationale: 'test setup',
  createdAt: NOW,
});

describe('riskPctForConviction', () => {
  it('maps conviction through the table', () => {
    expect(riskPctForConviction('LOW')).toBe(0.005);
    expect(riskPctForConviction('MEDIUM')).toBe(0.01);
    expect(riskPctForConviction('HIGH')).toBe(0.02);
  });

  it('orders conviction levels', () => {
    expect(compareConviction('LOW', 'MEDIUM')).toBeLessThan(0);
    expect(compareConviction('HIGH', 'MEDIUM')).toBeGreaterThan(0);
    expect(compareConviction('MEDIUM', 'MEDIUM')).toBe(0);
  });

  it('is monotonic and stays within bounds', () => {
    const pcts = CONVICTION_LEVELS.map(riskPctForConviction);
    for (let i = 1; i < pcts.length; i++) {
      expect(pcts[i]).toBeGreaterThanOrEqual(pcts[i - 1]);
    }
    for (const pct of pcts) {
      expect(pct).toBeGreaterThanOrEqual(RISK.minRiskPct);
      expect(pct).toBeLessThanOrEqual(RISK.maxRiskPct);
    }
  });
});

describe('sizePosition', () => {
  it('floors to whole units', () => {
    expect(sizePosition(1000, 0.01, 3, 10)).toEqual({
      riskAmount: 10,
      positionSize: 3,
      actualRiskAmount: 9,
      positionValue: 30,
    });
  });

  it('steps down when rounding would overshoot the budget', () => {
    const sizing = sizePosition(63, 0.01, 0.07, 1);
    expect(sizing.riskAmount).toBe(0.63);
    expect(sizing.positionSize).toBe(8);
    expect(sizing.actualRiskAmount).toBeLessThanOrEqual(sizing.riskAmount);
  });

  it('rejects non-positive equity', () => {
    expect(() => sizePosition(0, 0.01, 5, 100)).toThrow(InputError);
    expect(() => sizePosition(-5, 0.01, 5, 100)).toThrow(InputError);
  });

  it('rejects a size beyond the safe integer range', () => {
    expect(() => sizePosition(1e15, 0.02, 1e-3, 1)).toThrow(ValidationError);
    expect(() => sizePosition(1e15, 0.02, 1e-3, 1)).toThrow('position size exceeds safe integer range');
  });

  it('rejects a size that overflows to infinity', () => {
    expect(() => sizePosition(1e12, 0.02, 1e-300, 2e-300)).toThrow(ValidationError);
  });
});

describe('runRiskStage', () => {
  it('sizes a medium conviction long on 100k equity to 200 units', () => {
    const allocation = runRiskStage({ ...makeContext(), setup: setup(100, 95, [110]) }, fixedClock);

    expect(allocation).toMatchObject({
      equity: 100_000,
      conviction: 'MEDIUM',
      riskPct: 0.01,
      riskAmount: 1000,
      riskPerShare: 5,
      positionSize: 200,
      actualRiskAmount: 1000,
      positionValue: 20_000,
      sizeable: true,
      createdAt: NOW,
    });
    expect(allocation.rationale).toBe(
      'MEDIUM conviction risks 1.00% of 100000.00 equity (1000.00). At 5.00 risk per share that buys 200 units, risking 1000.00.',
    );
    expect(Object.isFrozen(allocation)).toBe(true);
  });

  it('returns a zero-size allocation when one unit exceeds the budget', () => {
    const context = makeContext({
      request: makeRequest({ equity: 5000 }),
      analyst: { ...longAnalyst, conviction: 'HIGH' },
    });
    const allocation = runRiskStage({ ...context, setup: setup(300, 150, [400]) }, fixedClock);

    expect(allocation.riskAmount).toBe(100);
    expect(allocation.riskPerShare).toBe(150);
    expect(allocation.positionSize).toBe(0);
    expect(allocation.actualRiskAmount).toBe(0);
    expect(allocation.sizeable).toBe(false);
    expect(allocation.rationale).toBe(
      'Setup is unsizeable at current risk tolerance: 150.00 risk per share exceeds the 100.00 budget (2.00% of 5000.00 equity).',
    );
  });

  it('fails with a ValidationError when the stop is vanishingly close to entry', () => {
    const context = makeContext({
      request: makeRequest({ equity: 1e12 }),
      analyst: { ...longAnalyst, conviction: 'HIGH' },
    });
    expect(() => runRiskStage({ ...context, setup: setup(2e-300, 1e-300, [3e-300]) }, fixedClock)).toThrow(
      ValidationError,
    );
  });

  it('returns identical allocations for identical inputs', () => {
    const context = { ...makeContext(), setup: setup(101.37, 99.12, [105]) };
    const first = runRiskStage(context, fixedClock);
    const second = runRiskStage(context, fixedClock);

    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  it('never risks more than the budget', () => {
    const cases: Array<[number, number, number]> = [
      [12_345, 101.37, 99.12],
      [250, 10, 9.99],
      [1_000_000, 3.21, 2.87],
      [777, 55.5, 58.25],
    ];
    for (const [equity, entry, stop] of cases) {
      for (const conviction of CONVICTION_LEVELS) {
        const context = makeContext({
          request: makeRequest({ equity }),
          analyst: { ...longAnalyst, conviction },
        });
        const allocation = runRiskStage({ ...context, setup: setup(entry, stop, [entry > stop ? entry + 1 : entry - 1]) }, fixedClock);
        expect(allocation.positionSize).toBeGreaterThanOrEqual(0);
        expect(Number.isInteger(allocation.positionSize)).toBe(true);
        expect(allocation.actualRiskAmount).toBeLessThanOrEqual(allocation.riskAmount);
      }
    }
  });
});
