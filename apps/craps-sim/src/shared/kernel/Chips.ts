import { InvalidChipsError } from '@shared/kernel/DomainError';

export class Chips {
  private constructor(private readonly units: number) {
    if (!Number.isFinite(units)) throw new InvalidChipsError('Must be finite');
    if (!Number.isInteger(units)) throw new InvalidChipsError('Must be whole chips');
    if (units < 0) throw new InvalidChipsError('Must be non-negative');
  }

  static of(units: number): Chips {
    return new Chips(units);
  }

  static zero(): Chips {
    return new Chips(0);
  }

  add(other: Chips): Chips {
    return new Chips(this.units + other.units);
  }

  subtract(other: Chips): Chips {
    return new Chips(this.units - other.units);
  }

  /** Scales by `numerator / denominator`, dropping any fractional chip. */
  multiplyRatio(numerator: number, denominator: number): Chips {
    return new Chips(Math.floor((this.units * numerator) / denominator));
  }

  isGreaterThan(other: Chips): boolean {
    return this.units > other.units;
  }

  isLessThan(other: Chips): boolean {
    return this.units < other.units;
  }

  isZero(): boolean {
    return this.units === 0;
  }

  toNumber(): number {
    return this.units;
  }

  equals(other: Chips): boolean {
    return this.units === other.units;
  }
}
