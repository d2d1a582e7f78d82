import { SimulationEvent } from '@simulation/domain/SimulationEvent';

/** Starting bankroll followed by the bankroll after every roll. */
export function bankrollSeries(
  events: readonly SimulationEvent[],
  seat: number,
  startingBankroll: number,
): number[] {
  return [startingBankroll, ...events.map((event) => event.bankrolls[seat])];
}

/** Population variance. */
export function variance(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  return values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length;
}

/** Largest fall from a running peak to a later value. */
export function maxDrawdown(values: readonly number[]): number {
  let peak = Number.NEGATIVE_INFINITY;
  let worst = 0;
  for (const value of values) {
    if (value > peak) peak = value;
    worst = Math.max(worst, peak - value);
  }
  return worst;
}
