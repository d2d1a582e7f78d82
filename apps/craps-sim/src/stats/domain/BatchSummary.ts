import { StopReason } from '@simulation/domain/StopReason';
import { RunSummary } from '@stats/domain/RunSummary';

export interface BatchPlayerSummary {
  name: string;
  strategyName: string;
  meanFinalBankroll: number;
  meanProfit: number;
  /** Share of runs the player finished below the table minimum. */
  bustRate: number;
  worstDrawdown: number;
}

export interface BatchSummary {
  runs: number;
  meanRolls: number;
  meanCompletedPoints: number;
  stopReasons: Partial<Record<StopReason, number>>;
  players: BatchPlayerSummary[];
}

const mean = (values: readonly number[]): number =>
  values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;

export function summarizeBatch(runs: readonly RunSummary[], tableMinimum: number): BatchSummary {
  const stopReasons: Partial<Record<StopReason, number>> = {};
  for (const run of runs) {
    stopReasons[run.stopReason] = (stopReasons[run.stopReason] ?? 0) + 1;
  }

  const seats = runs.length > 0 ? runs[0].players.length : 0;
  const players: BatchPlayerSummary[] = [];
  for (let seat = 0; seat < seats; seat++) {
    const perRun = runs.map((run) => run.players[seat]);
    const busted = perRun.filter((p) => p.finalBankroll < tableMinimum).length;
    players.push({
      name: perRun[0].name,
      strategyName: perRun[0].strategyName,
      meanFinalBankroll: mean(perRun.map((p) => p.finalBankroll)),
      meanProfit: mean(perRun.map((p) => p.totalProfit)),
      bustRate: busted / perRun.length,
      worstDrawdown: Math.max(...perRun.map((p) => p.maxDrawdown)),
    });
  }

  return {
    runs: runs.length,
    meanRolls: mean(runs.map((run) => run.rollCount)),
    meanCompletedPoints: mean(runs.map((run) => run.completedPoints)),
    stopReasons,
    players,
  };
}
