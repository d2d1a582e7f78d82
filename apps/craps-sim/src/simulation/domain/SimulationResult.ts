import { PlayerView } from '@player/domain/PlayerView';
import { BetSnapshot } from '@shared/kernel/BetSnapshot';
import { SimulationEvent } from '@simulation/domain/SimulationEvent';
import { StopReason } from '@simulation/domain/StopReason';

export interface SimulationResult {
  readonly events: readonly SimulationEvent[];
  readonly completedPoints: number;
  readonly stopReason: StopReason;
  readonly rollCount: number;
  readonly players: readonly PlayerView[];
  /** Stakes still on the table when the run stopped. */
  readonly outstandingBets: readonly BetSnapshot[];
}
