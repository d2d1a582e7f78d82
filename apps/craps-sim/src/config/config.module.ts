import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import {
  validatedEnvProvider,
  simulationConfigProvider,
  SIMULATION_CONFIG,
  VALIDATED_ENV,
} from './env-config.provider';

@Module({
  imports: [
    ConfigModule.forRoot({
      envFilePath: ['.env.local', '.env'],
    }),
  ],
  providers: [validatedEnvProvider, simulationConfigProvider],
  exports: [VALIDATED_ENV, SIMULATION_CONFIG],
})
export class SimConfigModule {}
