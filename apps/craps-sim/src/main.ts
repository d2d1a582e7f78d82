import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { VALIDATED_ENV } from '@config/env-config.provider';
import { SimEnv } from '@config/sim-env.schema';
import { RunBatchUseCase } from '@simulation/application/RunBatchUseCase';
import { RunSimulationUseCase } from '@simulation/application/RunSimulationUseCase';
import { consoleFrameObserver } from '@simulation/infrastructure/ConsoleFrameRenderer';
import {
  RUN_BATCH_USE_CASE,
  RUN_SIMULATION_USE_CASE,
} from '@simulation/infrastructure/simulation.module';
import { renderBatchReport, renderRunReport } from '@simulation/infrastructure/TextReportRenderer';

const writeLine = (line: string): void => {
  process.stdout.write(`${line}\n`);
};

async function bootstrap(): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule, { logger: ['error', 'warn'] });

  try {
    const env = app.get<SimEnv>(VALIDATED_ENV);

    if (env.SIM_RUNS > 1) {
      const batch = app.get<RunBatchUseCase>(RUN_BATCH_USE_CASE);
      const { summary } = batch.execute({ runs: env.SIM_RUNS });
      writeLine(renderBatchReport(summary));
    } else {
      const single = app.get<RunSimulationUseCase>(RUN_SIMULATION_USE_CASE);
      const { summary } = single.execute({
        onFrame: env.SIM_VERBOSE ? consoleFrameObserver(writeLine) : undefined,
      });
      writeLine(renderRunReport(summary));
    }
  } finally {
    await app.close();
  }
}

bootstrap().catch((err) => {
  console.error('[CrapsSim] Fatal error:', err);
  process.exit(1);
});
