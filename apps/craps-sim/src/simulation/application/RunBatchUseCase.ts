import { DiceSourceFactory } from '@rng/application/ports/DiceSource';
import { InvalidConfigurationError } from '@shared/kernel/DomainError';
import { Logger } from '@shared/ports/Logger';
import { Simulation } from '@simulation/application/Simulation';
import { SimulationConfig } from '@simulation/domain/SimulationConfig';
import { BatchSummary, summarizeBatch } from '@stats/domain/BatchSummary';
import { RunSummary, summarizeRun } from '@stats/domain/RunSummary';

export interface RunBatchCommand {
  runs: number;
  maxRolls?: number;
}

export interface RunBatchOutput {
  runs: RunSummary[];
  summary: BatchSummary;
}

/**
 * Executes independent runs back to back. Each run gets a fresh
 * `Simulation` and its own dice source, so run `i` of a seeded batch is
 * reproducible on its own.
 */
export class RunBatchUseCase {
  constructor(
    private readonly config: SimulationConfig,
    private readonly diceFactory: DiceSourceFactory,
    private readonly logger: Logger,
  ) {}

  execute(command: RunBatchCommand): RunBatchOutput {
    if (!Number.isInteger(command.runs) || command.runs <= 0) {
      throw new InvalidConfigurationError(`runs must be a positive integer, got ${command.runs}`);
    }

    const runs: RunSummary[] = [];
    for (let i = 0; i < command.runs; i++) {
      const simulation = new Simulation(this.config, this.diceFactory.create(i), this.logger);
      runs.push(summarizeRun(simulation.run(command.maxRolls)));
    }

    const summary = summarizeBatch(runs, this.config.table.minBet);
    this.logger.info('Batch finished', {
      runs: summary.runs,
      meanRolls: summary.meanRolls,
      meanCompletedPoints: summary.meanCompletedPoints,
    });
    return { runs, summary };
  }
}
