import { BetKind } from '@betting/domain/BetKind';
import { PointNumber } from '@rng/domain/DiceOutcome';
import { Bet } from '@betting/domain/Bet';

export interface PlaceBetCommand {
  playerId: string;
  kind: BetKind;
  amount: number;
  /** Table point at placement time; absent during come-out. */
  point?: PointNumber;
}

export type PlaceBetError =
  | 'INVALID_AMOUNT'
  | 'BELOW_TABLE_MINIMUM'
  | 'ABOVE_TABLE_MAXIMUM'
  | 'DUPLICATE_BET'
  | 'BET_NOT_ALLOWED';

export type PlaceBetResult =
  | { success: true; bet: Bet }
  | { success: false; error: PlaceBetError };
