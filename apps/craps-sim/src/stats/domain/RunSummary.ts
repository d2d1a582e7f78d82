import { PlayerView } from '@player/domain/PlayerView';
import { SimulationResult } from '@simulation/domain/SimulationResult';
import { SimulationEvent } from '@simulation/domain/SimulationEvent';
import { StopReason } from '@simulation/domain/StopReason';
import { DiceTotals, computeDiceTotals } from '@stats/domain/DiceTotals';
import { bankrollSeries, maxDrawdown, variance } from '@stats/domain/BankrollSeries';

export interface PlayerSummary {
  name: string;
  strategyName: string;
  finalBankroll: number;
  totalProfit: number;
  shooterProfit: number;
  pointsPlayedAsShooter: number;
  wins: number;
  losses: number;
  pushes: number;
  totalWagered: number;
  bankrollVariance: number;
  maxDrawdown: number;
}

export interface RunSummary {
  stopReason: StopReason;
  rollCount: number;
  completedPoints: number;
  outstandingStake: number;
  dice: DiceTotals;
  players: PlayerSummary[];
}

export function summarizePlayers(
  players: readonly PlayerView[],
  events: readonly SimulationEvent[],
): PlayerSummary[] {
  return players.map((player, seat) => {
    const series = bankrollSeries(events, seat, player.startingBankroll);
    return {
      name: player.name,
      strategyName: player.strategyName,
      finalBankroll: player.bankroll,
      totalProfit: player.bankroll - player.startingBankroll,
      shooterProfit: player.shooterProfit,
      pointsPlayedAsShooter: player.pointsPlayedAsShooter,
      wins: player.wins,
      losses: player.losses,
      pushes: player.pushes,
      totalWagered: player.totalWagered,
      bankrollVariance: variance(series),
      maxDrawdown: maxDrawdown(series),
    };
  });
}

export function summarizeRun(result: SimulationResult): RunSummary {
  return {
    stopReason: result.stopReason,
    rollCount: result.rollCount,
    completedPoints: result.completedPoints,
    outstandingStake: result.outstandingBets.reduce((sum, bet) => sum + bet.amount, 0),
    dice: computeDiceTotals(result.events),
    players: summarizePlayers(result.players, result.events),
  };
}
