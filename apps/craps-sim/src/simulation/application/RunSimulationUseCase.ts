import { DiceSourceFactory } from '@rng/application/ports/DiceSource';
import { Logger } from '@shared/ports/Logger';
import { FrameObserver } from '@simulation/application/ports/FrameObserver';
import { Simulation } from '@simulation/application/Simulation';
import { SimulationConfig } from '@simulation/domain/SimulationConfig';
import { SimulationResult } from '@simulation/domain/SimulationResult';
import { RunSummary, summarizeRun } from '@stats/domain/RunSummary';

export interface RunSimulationCommand {
  maxRolls?: number;
  onFrame?: FrameObserver;
}

export interface RunSimulationOutput {
  result: SimulationResult;
  summary: RunSummary;
}

export class RunSimulationUseCase {
  constructor(
    private readonly config: SimulationConfig,
    private readonly diceFactory: DiceSourceFactory,
    private readonly logger: Logger,
  ) {}

  execute(command: RunSimulationCommand = {}): RunSimulationOutput {
    const simulation = new Simulation(this.config, this.diceFactory.create(0), this.logger);
    const result = simulation.run(command.maxRolls, command.onFrame);
    return { result, summary: summarizeRun(result) };
  }
}
