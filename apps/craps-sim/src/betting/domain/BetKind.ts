import { RoundResult } from '@engine/domain/RoundResult';
import { Phase } from '@engine/domain/Phase';
import { PointNumber } from '@rng/domain/DiceOutcome';

export enum BetKind {
  PASS_LINE = 'PASS_LINE',
  PASS_ODDS = 'PASS_ODDS',
  DONT_PASS = 'DONT_PASS',
  FIELD = 'FIELD',
}

export enum BetOutcome {
  WIN = 'WIN',
  LOSE = 'LOSE',
  PUSH = 'PUSH',
}

/** Winnings on a WIN are `stake * numerator / denominator`. */
export interface Settlement {
  outcome: BetOutcome;
  numerator: number;
  denominator: number;
}

interface BetKindRules {
  priority: number;
  stackable: boolean;
  resolve(result: RoundResult, pointAtPlacement?: PointNumber): Settlement | null;
}

const EVEN_MONEY = { numerator: 1, denominator: 1 };

const win = (numerator = 1, denominator = 1): Settlement => ({
  outcome: BetOutcome.WIN,
  numerator,
  denominator,
});
const lose = (): Settlement => ({ outcome: BetOutcome.LOSE, ...EVEN_MONEY });
const push = (): Settlement => ({ outcome: BetOutcome.PUSH, ...EVEN_MONEY });

export const TRUE_ODDS: Record<PointNumber, { numerator: number; denominator: number }> = {
  4: { numerator: 2, denominator: 1 },
  5: { numerator: 3, denominator: 2 },
  6: { numerator: 6, denominator: 5 },
  8: { numerator: 6, denominator: 5 },
  9: { numerator: 3, denominator: 2 },
  10: { numerator: 2, denominator: 1 },
};

const rules: Record<BetKind, BetKindRules> = {
  [BetKind.PASS_LINE]: {
    priority: 0,
    stackable: false,
    resolve: (result) => {
      if (result.natural || result.completedPoint) return win();
      if (result.craps || result.sevenOut) return lose();
      return null;
    },
  },
  [BetKind.PASS_ODDS]: {
    priority: 1,
    stackable: false,
    resolve: (result, pointAtPlacement) => {
      const point = pointAtPlacement ?? result.pointBefore;
      if (result.completedPoint && point !== undefined) {
        const odds = TRUE_ODDS[point];
        return win(odds.numerator, odds.denominator);
      }
      if (result.sevenOut) return lose();
      return null;
    },
  },
  [BetKind.DONT_PASS]: {
    priority: 2,
    stackable: false,
    resolve: (result) => {
      if (result.phaseBefore === Phase.COME_OUT) {
        if (result.outcome.total === 12) return push();
        if (result.craps) return win();
        if (result.natural) return lose();
        return null;
      }
      if (result.sevenOut) return win();
      if (result.completedPoint) return lose();
      return null;
    },
  },
  [BetKind.FIELD]: {
    priority: 3,
    stackable: true,
    resolve: (result) => {
      switch (result.outcome.total) {
        case 2:
          return win(2, 1);
        case 12:
          return win(3, 1);
        case 3:
        case 4:
        case 9:
        case 10:
        case 11:
          return win();
        default:
          return lose();
      }
    },
  },
};

export function betKindPriority(kind: BetKind): number {
  return rules[kind].priority;
}

export function isStackable(kind: BetKind): boolean {
  return rules[kind].stackable;
}

export function settle(
  kind: BetKind,
  result: RoundResult,
  pointAtPlacement?: PointNumber,
): Settlement | null {
  return rules[kind].resolve(result, pointAtPlacement);
}
