import { z } from 'zod';
import { BetKind } from '@betting/domain/BetKind';

const chips = z.number().int().nonnegative();

const lineBetting = {
  unit: z.number().int().positive('unit must be > 0'),
  contract: z.enum([BetKind.PASS_LINE, BetKind.DONT_PASS]).default(BetKind.PASS_LINE),
  oddsMultiple: z.number().nonnegative().default(0),
  fieldUnit: chips.default(0),
};

const strategySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('flat'), ...lineBetting }),
  z.object({
    type: z.literal('progressive'),
    ...lineBetting,
    maxDoublings: z.number().int().nonnegative().default(4),
  }),
  z.object({ type: z.literal('none') }),
]);

const playerSchema = z
  .object({
    name: z.string().trim().min(1, 'name must not be empty'),
    bankroll: chips,
    canShoot: z.boolean().default(true),
    stopLoss: chips.optional(),
    stopWin: chips.optional(),
    strategy: strategySchema,
  })
  .refine((p) => p.stopWin === undefined || p.stopWin > p.bankroll, {
    message: 'stopWin must be greater than bankroll',
    path: ['stopWin'],
  });

export const simulationFileSchema = z
  .object({
    table: z.object({
      minBet: z.number().int().positive('minBet must be > 0'),
      maxBet: z.number().int().positive('maxBet must be > 0'),
      maxOddsMultiple: z.number().nonnegative().default(2),
    }),
    simulation: z.object({
      targetPoints: z.number().int().positive('targetPoints must be > 0'),
      maxRolls: z.number().int().nonnegative().default(10_000),
      shooterRotation: z.enum(['point-completed', 'seven-out']).default('point-completed'),
    }),
    players: z.array(playerSchema).min(1, 'at least one player is required'),
  })
  .refine((data) => data.table.minBet <= data.table.maxBet, {
    message: 'minBet must not exceed maxBet',
    path: ['table', 'minBet'],
  })
  .refine((data) => data.players.some((p) => p.canShoot), {
    message: 'at least one player must be allowed to shoot',
    path: ['players'],
  });

export type SimulationFile = z.infer<typeof simulationFileSchema>;
