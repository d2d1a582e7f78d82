import { TableLimits } from '@betting/domain/BetLedger';
import { StrategyConfig } from '@strategy/domain/StrategyConfig';

/**
 * `point-completed` passes the dice each time the shooter makes a point;
 * `seven-out` passes them when the shooter sevens out.
 */
export type ShooterRotation = 'point-completed' | 'seven-out';

export interface PlayerConfig {
  name: string;
  bankroll: number;
  canShoot: boolean;
  stopLoss?: number;
  stopWin?: number;
  strategy: StrategyConfig;
}

export interface SimulationConfig {
  table: TableLimits;
  targetPoints: number;
  maxRolls: number;
  shooterRotation: ShooterRotation;
  players: PlayerConfig[];
}
