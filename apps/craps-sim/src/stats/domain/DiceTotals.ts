import { Phase } from '@engine/domain/Phase';
import { SimulationEvent } from '@simulation/domain/SimulationEvent';

export type TotalCounts = Record<number, number>;

export interface DiceTotals {
  totalRolls: number;
  byTotal: TotalCounts;
  byTotalComeOut: TotalCounts;
  byTotalPointOn: TotalCounts;
}

export function emptyTotals(): TotalCounts {
  const counts: TotalCounts = {};
  for (let total = 2; total <= 12; total++) counts[total] = 0;
  return counts;
}

/** Counts dice totals overall and split by the phase the roll was thrown in. */
export function computeDiceTotals(events: readonly SimulationEvent[]): DiceTotals {
  const byTotal = emptyTotals();
  const byTotalComeOut = emptyTotals();
  const byTotalPointOn = emptyTotals();

  for (const event of events) {
    const total = event.outcome.total;
    byTotal[total]++;
    if (event.facts.phaseBefore === Phase.COME_OUT) {
      byTotalComeOut[total]++;
    } else {
      byTotalPointOn[total]++;
    }
  }

  return { totalRolls: events.length, byTotal, byTotalComeOut, byTotalPointOn };
}
