import { PlayerView } from '@player/domain/PlayerView';
import { GameView } from '@strategy/domain/GameView';
import { planLineBets } from '@strategy/domain/LineBetting';
import { BetDecision, Strategy } from '@strategy/domain/Strategy';
import { LineBettingOptions } from '@strategy/domain/StrategyConfig';

/** Doubles the contract stake after each loss, back to one unit after a win. */
export class ProgressiveStrategy implements Strategy {
  readonly name = 'progressive';

  constructor(
    private readonly options: LineBettingOptions,
    private readonly maxDoublings: number,
  ) {}

  decide(game: GameView, player: PlayerView): BetDecision[] {
    return planLineBets(game, player, this.options, this.contractAmount(game, player));
  }

  contractAmount(game: GameView, player: PlayerView): number {
    const doublings = Math.min(player.consecutiveLosses, this.maxDoublings);
    const amount = Math.min(this.options.unit * 2 ** doublings, game.maxBet);
    return amount > player.bankroll ? this.options.unit : amount;
  }
}
