import { BetOutcome } from '@betting/domain/BetKind';
import { PlaceBetError } from '@betting/domain/PlaceBet';
import { Phase } from '@engine/domain/Phase';
import { RoundEngineState } from '@engine/domain/RoundResult';
import { BetSnapshot } from '@shared/kernel/BetSnapshot';

export interface ResolvedBetSnapshot extends BetSnapshot {
  outcome: BetOutcome;
  payout: number;
}

export interface RejectedBet {
  playerId: string;
  kind: string;
  amount: number;
  error: PlaceBetError | 'INSUFFICIENT_FUNDS';
}

export interface RollFacts {
  phaseBefore: Phase;
  pointEstablished?: number;
  completedPoint: boolean;
  sevenOut: boolean;
  natural: boolean;
  craps: boolean;
}

export interface SimulationEvent {
  readonly rollIndex: number;
  /** Seat of the player who threw this roll. */
  readonly shooterIndex: number;
  readonly shooterRollIndex: number;
  readonly outcome: { readonly die1: number; readonly die2: number; readonly total: number };
  readonly state: RoundEngineState;
  readonly facts: RollFacts;
  readonly resolvedBets: readonly ResolvedBetSnapshot[];
  readonly rejectedBets: readonly RejectedBet[];
  readonly outstandingBets: readonly BetSnapshot[];
  /** Bankroll of every seat after payouts, in seat order. */
  readonly bankrolls: readonly number[];
  readonly shooterProfit: number;
}
