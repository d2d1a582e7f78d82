import { DiceOutcome } from '@rng/domain/DiceOutcome';

export interface DiceSource {
  roll(): DiceOutcome;
}

/** Builds one independent source per run of a batch. */
export interface DiceSourceFactory {
  create(runIndex: number): DiceSource;
}
