import { Phase } from '@engine/domain/Phase';
import { RoundResult } from '@engine/domain/RoundResult';
import { PlayerView } from '@player/domain/PlayerView';
import { BetSnapshot } from '@shared/kernel/BetSnapshot';
import { SimulationEvent } from '@simulation/domain/SimulationEvent';

export type FrameStage = 'initial' | 'after_bets' | 'after_roll' | 'after_payouts';

export interface SimulationFrame {
  stage: FrameStage;
  rollIndex: number;
  shooterIndex: number;
  phase: Phase;
  point?: number;
  completedPoints: number;
  players: readonly PlayerView[];
  outstandingBets: readonly BetSnapshot[];
  /** Present from `after_roll` on. */
  roundResult?: RoundResult;
  /** Present at `after_payouts`. */
  event?: SimulationEvent;
}

/**
 * Invoked synchronously at each stage of a roll. Must not mutate the
 * simulation; anything it throws aborts the run.
 */
export type FrameObserver = (frame: SimulationFrame) => void;
