import { BetKind } from '@betting/domain/BetKind';
import { Phase } from '@engine/domain/Phase';
import { PointNumber } from '@rng/domain/DiceOutcome';

export interface OutstandingBetView {
  readonly kind: BetKind;
  readonly amount: number;
}

/** What a strategy may see of the table when it is asked to bet. */
export interface GameView {
  readonly phase: Phase;
  readonly point?: PointNumber;
  readonly rollIndex: number;
  readonly minBet: number;
  readonly maxBet: number;
  readonly maxOddsMultiple: number;
  /** The deciding player's own outstanding bets. */
  readonly outstanding: readonly OutstandingBetView[];
}

export function outstandingAmount(game: GameView, kind: BetKind): number {
  let total = 0;
  for (const bet of game.outstanding) {
    if (bet.kind === kind) total += bet.amount;
  }
  return total;
}

export function hasOutstanding(game: GameView, kind: BetKind): boolean {
  return game.outstanding.some((bet) => bet.kind === kind);
}
