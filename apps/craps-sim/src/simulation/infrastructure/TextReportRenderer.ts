import { StopReason } from '@simulation/domain/StopReason';
import { BatchSummary } from '@stats/domain/BatchSummary';
import { TotalCounts } from '@stats/domain/DiceTotals';
import { RunSummary } from '@stats/domain/RunSummary';

const signed = (value: number, digits = 0): string =>
  `${value >= 0 ? '+' : ''}${value.toFixed(digits)}`;

const pad = (value: number | string, width: number): string => String(value).padStart(width);

function diceTable(all: TotalCounts, comeOut: TotalCounts, pointOn: TotalCounts): string[] {
  const lines = ['Dice totals (all / come-out / point-on)'];
  for (let total = 2; total <= 12; total++) {
    lines.push(`  ${pad(total, 2)}: ${pad(all[total], 6)} ${pad(comeOut[total], 6)} ${pad(pointOn[total], 6)}`);
  }
  return lines;
}

export function renderRunReport(summary: RunSummary): string {
  const lines = [
    `Stop reason: ${summary.stopReason}`,
    `Rolls: ${summary.rollCount}`,
    `Completed points: ${summary.completedPoints}`,
    ...(summary.outstandingStake > 0 ? [`Outstanding stakes: ${summary.outstandingStake}`] : []),
    '',
    ...diceTable(summary.dice.byTotal, summary.dice.byTotalComeOut, summary.dice.byTotalPointOn),
    '',
    'Players',
  ];

  for (const p of summary.players) {
    lines.push(
      `  ${p.name} (${p.strategyName}): bankroll ${p.finalBankroll} (${signed(p.totalProfit)}), ` +
        `wagered ${p.totalWagered}, W/L/P ${p.wins}/${p.losses}/${p.pushes}, ` +
        `shooter ${signed(p.shooterProfit)} over ${p.pointsPlayedAsShooter} points, ` +
        `variance ${p.bankrollVariance.toFixed(2)}, max drawdown ${p.maxDrawdown}`,
    );
  }

  return lines.join('\n');
}

export function renderBatchReport(summary: BatchSummary): string {
  const reasons = Object.values(StopReason)
    .filter((reason) => (summary.stopReasons[reason] ?? 0) > 0)
    .map((reason) => `${reason}=${summary.stopReasons[reason] ?? 0}`);

  const lines = [
    `Runs: ${summary.runs}`,
    `Mean rolls: ${summary.meanRolls.toFixed(2)}`,
    `Mean completed points: ${summary.meanCompletedPoints.toFixed(2)}`,
    `Stop reasons: ${reasons.join(', ')}`,
    '',
    'Players',
  ];

  for (const p of summary.players) {
    lines.push(
      `  ${p.name} (${p.strategyName}): mean bankroll ${p.meanFinalBankroll.toFixed(2)}, ` +
        `mean profit ${signed(p.meanProfit, 2)}, bust rate ${(p.bustRate * 100).toFixed(1)}%, ` +
        `worst drawdown ${p.worstDrawdown}`,
    );
  }

  return lines.join('\n');
}
