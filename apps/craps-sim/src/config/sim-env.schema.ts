import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'], {
    errorMap: () => ({ message: 'SIM_VERBOSE must be one of true, false, 1, 0' }),
  })
  .optional()
  .transform((value) => value === 'true' || value === '1');

export const simEnvSchema = z.object({
  SIM_CONFIG_PATH: z.string().min(1).default('config/simulation.json'),

  SIM_SEED: z.string().trim().min(1, 'SIM_SEED must not be blank').optional(),

  SIM_RUNS: z.coerce.number().int().positive('SIM_RUNS must be > 0').default(1),

  SIM_MAX_ROLLS: z.coerce.number().int().nonnegative('SIM_MAX_ROLLS must be >= 0').optional(),

  SIM_VERBOSE: booleanFlag,

  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
});

export type SimEnv = z.infer<typeof simEnvSchema>;
