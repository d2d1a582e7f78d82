import { PlayerView } from '@player/domain/PlayerView';
import { GameView } from '@strategy/domain/GameView';
import { planLineBets } from '@strategy/domain/LineBetting';
import { BetDecision, Strategy } from '@strategy/domain/Strategy';
import { LineBettingOptions } from '@strategy/domain/StrategyConfig';

export class FlatStrategy implements Strategy {
  readonly name = 'flat';

  constructor(private readonly options: LineBettingOptions) {}

  decide(game: GameView, player: PlayerView): BetDecision[] {
    return planLineBets(game, player, this.options, this.options.unit);
  }
}
