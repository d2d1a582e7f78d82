import { readFileSync } from 'fs';
import { resolve } from 'path';
import { Provider } from '@nestjs/common';
import { ZodError } from 'zod';
import { InvalidConfigurationError } from '@shared/kernel/DomainError';
import { SimulationConfig } from '@simulation/domain/SimulationConfig';
import { SimEnv, simEnvSchema } from './sim-env.schema';
import { SimulationFile, simulationFileSchema } from './simulation-file.schema';

export const VALIDATED_ENV = 'VALIDATED_ENV';
export const SIMULATION_CONFIG = 'SIMULATION_CONFIG';

function formatIssues(error: ZodError): string {
  return error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

export function parseSimEnv(env: NodeJS.ProcessEnv): SimEnv {
  const result = simEnvSchema.safeParse({
    SIM_CONFIG_PATH: env.SIM_CONFIG_PATH,
    SIM_SEED: env.SIM_SEED,
    SIM_RUNS: env.SIM_RUNS,
    SIM_MAX_ROLLS: env.SIM_MAX_ROLLS,
    SIM_VERBOSE: env.SIM_VERBOSE,
    LOG_LEVEL: env.LOG_LEVEL,
  });

  if (!result.success) {
    throw new InvalidConfigurationError(
      `[SimConfig] Invalid environment variables:\n${formatIssues(result.error)}`,
    );
  }
  return result.data;
}

export function parseSimulationFile(raw: unknown, source: string): SimulationFile {
  const result = simulationFileSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidConfigurationError(
      `[SimConfig] Invalid simulation file ${source}:\n${formatIssues(result.error)}`,
    );
  }
  return result.data;
}

export function readSimulationFile(path: string): SimulationFile {
  const absolute = resolve(process.cwd(), path);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(absolute, 'utf8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidConfigurationError(`[SimConfig] Cannot read ${absolute}: ${reason}`);
  }
  return parseSimulationFile(raw, absolute);
}

/** `SIM_MAX_ROLLS` overrides the roll guard from the file. */
export function toSimulationConfig(file: SimulationFile, env: SimEnv): SimulationConfig {
  return {
    table: file.table,
    targetPoints: file.simulation.targetPoints,
    maxRolls: env.SIM_MAX_ROLLS ?? file.simulation.maxRolls,
    shooterRotation: file.simulation.shooterRotation,
    players: file.players,
  };
}

/**
 * Runs Zod validation once at boot. All other providers
 * derive their values from this single source of truth.
 */
export const validatedEnvProvider: Provider<SimEnv> = {
  provide: VALIDATED_ENV,
  useFactory: (): SimEnv => parseSimEnv(process.env),
};

export const simulationConfigProvider: Provider<SimulationConfig> = {
  provide: SIMULATION_CONFIG,
  useFactory: (env: SimEnv): SimulationConfig =>
    toSimulationConfig(readSimulationFile(env.SIM_CONFIG_PATH), env),
  inject: [VALIDATED_ENV],
};
