import { Module } from '@nestjs/common';
import { SimConfigModule } from '@config/config.module';
import { SIMULATION_CONFIG } from '@config/env-config.provider';
import { DiceSourceFactory } from '@rng/application/ports/DiceSource';
import { DICE_SOURCE_FACTORY, RngModule } from '@rng/infrastructure/rng.module';
import { LOGGER, LoggingModule } from '@shared/infrastructure/logging.module';
import { Logger } from '@shared/ports/Logger';
import { RunBatchUseCase } from '@simulation/application/RunBatchUseCase';
import { RunSimulationUseCase } from '@simulation/application/RunSimulationUseCase';
import { SimulationConfig } from '@simulation/domain/SimulationConfig';

export const RUN_SIMULATION_USE_CASE = 'RunSimulationUseCase';
export const RUN_BATCH_USE_CASE = 'RunBatchUseCase';

@Module({
  imports: [SimConfigModule, RngModule, LoggingModule],
  providers: [
    {
      provide: RUN_SIMULATION_USE_CASE,
      useFactory: (
        config: SimulationConfig,
        diceFactory: DiceSourceFactory,
        logger: Logger,
      ): RunSimulationUseCase => new RunSimulationUseCase(config, diceFactory, logger),
      inject: [SIMULATION_CONFIG, DICE_SOURCE_FACTORY, LOGGER],
    },
    {
      provide: RUN_BATCH_USE_CASE,
      useFactory: (
        config: SimulationConfig,
        diceFactory: DiceSourceFactory,
        logger: Logger,
      ): RunBatchUseCase => new RunBatchUseCase(config, diceFactory, logger),
      inject: [SIMULATION_CONFIG, DICE_SOURCE_FACTORY, LOGGER],
    },
  ],
  exports: [RUN_SIMULATION_USE_CASE, RUN_BATCH_USE_CASE],
})
export class SimulationModule {}
