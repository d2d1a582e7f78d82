import { BetKind } from '@betting/domain/BetKind';
import { PlayerView } from '@player/domain/PlayerView';
import { GameView } from '@strategy/domain/GameView';

export interface BetDecision {
  readonly kind: BetKind;
  readonly amount: number;
}

/**
 * Maps the table and a player's own state to the bets that player wants
 * down before the next roll. Implementations must be pure: equal inputs
 * give equal decisions, and neither argument is mutated.
 */
export interface Strategy {
  readonly name: string;
  decide(game: GameView, player: PlayerView): BetDecision[];
}
