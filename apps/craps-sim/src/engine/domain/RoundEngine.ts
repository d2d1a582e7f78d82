import { DiceOutcome, PointNumber, isPointNumber, isValidDie } from '@rng/domain/DiceOutcome';
import { Phase } from '@engine/domain/Phase';
import { RoundEngineState, RoundResult } from '@engine/domain/RoundResult';
import { InvalidOutcomeError, InvalidStateTransition } from '@shared/kernel/DomainError';

/**
 * Come-out / point state machine. Holds no bets; the ledger reads the
 * returned {@link RoundResult} to settle them.
 */
export class RoundEngine {
  private _phase: Phase = Phase.COME_OUT;
  private _point?: PointNumber;
  private _completedPoints = 0;

  get phase(): Phase {
    return this._phase;
  }

  get point(): PointNumber | undefined {
    return this._point;
  }

  get completedPoints(): number {
    return this._completedPoints;
  }

  snapshot(): RoundEngineState {
    return Object.freeze({
      phase: this._phase,
      point: this._point,
      completedPoints: this._completedPoints,
    });
  }

  roll(outcome: DiceOutcome): RoundResult {
    // DiceOutcome validates itself, but the parameter is structurally typed.
    if (!isValidDie(outcome.die1) || !isValidDie(outcome.die2)) {
      throw new InvalidOutcomeError(
        `Dice must be integers 1-6, got ${outcome.die1} and ${outcome.die2}`,
      );
    }

    const phaseBefore = this._phase;
    const pointBefore = this._point;
    const total = outcome.die1 + outcome.die2;

    let pointEstablished: PointNumber | undefined;
    let completedPoint = false;
    let sevenOut = false;
    let natural = false;
    let craps = false;

    if (phaseBefore === Phase.COME_OUT) {
      if (total === 7 || total === 11) {
        natural = true;
      } else if (total === 2 || total === 3 || total === 12) {
        craps = true;
      } else if (isPointNumber(total)) {
        pointEstablished = total;
        this._point = total;
        this._phase = Phase.POINT_ON;
      }
    } else {
      if (pointBefore === undefined) {
        throw new InvalidStateTransition('POINT_ON phase without an active point');
      }
      if (total === pointBefore) {
        completedPoint = true;
        this._completedPoints++;
        this.resetToComeOut();
      } else if (total === 7) {
        sevenOut = true;
        this.resetToComeOut();
      }
    }

    return Object.freeze({
      outcome,
      phaseBefore,
      phaseAfter: this._phase,
      pointBefore,
      pointAfter: this._point,
      pointEstablished,
      completedPoint,
      sevenOut,
      natural,
      craps,
    });
  }

  private resetToComeOut(): void {
    this._phase = Phase.COME_OUT;
    this._point = undefined;
  }
}
