import { DiceOutcome, PointNumber } from '@rng/domain/DiceOutcome';
import { Phase } from '@engine/domain/Phase';

export interface RoundResult {
  readonly outcome: DiceOutcome;
  readonly phaseBefore: Phase;
  readonly phaseAfter: Phase;
  readonly pointBefore?: PointNumber;
  readonly pointAfter?: PointNumber;
  /** Set only on the come-out roll that establishes a point. */
  readonly pointEstablished?: PointNumber;
  readonly completedPoint: boolean;
  readonly sevenOut: boolean;
  /** Come-out 7 or 11. */
  readonly natural: boolean;
  /** Come-out 2, 3 or 12. */
  readonly craps: boolean;
}

export interface RoundEngineState {
  readonly phase: Phase;
  readonly point?: PointNumber;
  readonly completedPoints: number;
}
