import { BetKind } from '@betting/domain/BetKind';
import { PointNumber } from '@rng/domain/DiceOutcome';
import { Chips } from '@shared/kernel/Chips';

export class Bet {
  constructor(
    readonly id: string,
    readonly playerId: string,
    readonly kind: BetKind,
    readonly amount: Chips,
    readonly sequence: number,
    readonly pointAtPlacement?: PointNumber,
  ) {
    Object.freeze(this);
  }
}
