import { Module } from '@nestjs/common';
import { SimConfigModule } from './config/config.module';
import { LoggingModule } from '@shared/infrastructure/logging.module';
import { RngModule } from '@rng/infrastructure/rng.module';
import { SimulationModule } from '@simulation/infrastructure/simulation.module';

@Module({
  imports: [SimConfigModule, LoggingModule, RngModule, SimulationModule],
})
export class AppModule {}
