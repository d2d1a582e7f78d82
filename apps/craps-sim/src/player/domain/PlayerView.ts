import { BetOutcome } from '@betting/domain/BetKind';

/** Read-only picture of a player handed to strategies and renderers. */
export interface PlayerView {
  readonly id: string;
  readonly name: string;
  readonly strategyName: string;
  readonly bankroll: number;
  readonly startingBankroll: number;
  readonly consecutiveLosses: number;
  readonly lastOutcome?: BetOutcome;
  readonly wins: number;
  readonly losses: number;
  readonly pushes: number;
  readonly shooterProfit: number;
  readonly pointsPlayedAsShooter: number;
  readonly totalWagered: number;
}
