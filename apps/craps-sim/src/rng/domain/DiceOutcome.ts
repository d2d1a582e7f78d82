import { InvalidOutcomeError } from '@shared/kernel/DomainError';

export const POINT_NUMBERS = [4, 5, 6, 8, 9, 10] as const;
export type PointNumber = (typeof POINT_NUMBERS)[number];

export function isPointNumber(total: number): total is PointNumber {
  return POINT_NUMBERS.some((point) => point === total);
}

export function isValidDie(value: number): boolean {
  return Number.isInteger(value) && value >= 1 && value <= 6;
}

export class DiceOutcome {
  readonly total: number;

  private constructor(
    readonly die1: number,
    readonly die2: number,
  ) {
    if (!isValidDie(die1)) {
      throw new InvalidOutcomeError(`die1 must be an integer 1-6, got ${die1}`);
    }
    if (!isValidDie(die2)) {
      throw new InvalidOutcomeError(`die2 must be an integer 1-6, got ${die2}`);
    }
    this.total = die1 + die2;
    Object.freeze(this);
  }

  static of(die1: number, die2: number): DiceOutcome {
    return new DiceOutcome(die1, die2);
  }

  isNatural(): boolean {
    return this.total === 7 || this.total === 11;
  }

  isCraps(): boolean {
    return this.total === 2 || this.total === 3 || this.total === 12;
  }

  isPointNumber(): boolean {
    return isPointNumber(this.total);
  }

  toString(): string {
    return `${this.die1}+${this.die2}=${this.total}`;
  }
}
