import { BetKind } from '@betting/domain/BetKind';
import { Phase } from '@engine/domain/Phase';
import { PlayerView } from '@player/domain/PlayerView';
import { GameView, hasOutstanding, outstandingAmount } from '@strategy/domain/GameView';
import { BetDecision } from '@strategy/domain/Strategy';
import { LineBettingOptions } from '@strategy/domain/StrategyConfig';

/**
 * Shared plan for the line-betting variants: a contract bet on the
 * come-out, optional odds behind the pass line, optional field bet.
 * Only the contract stake differs between variants.
 */
export function planLineBets(
  game: GameView,
  player: PlayerView,
  options: LineBettingOptions,
  contractAmount: number,
): BetDecision[] {
  const decisions: BetDecision[] = [];
  let available = player.bankroll;

  const propose = (kind: BetKind, amount: number): void => {
    if (amount <= 0 || amount > available) return;
    decisions.push({ kind, amount });
    available -= amount;
  };

  if (game.phase === Phase.COME_OUT && !hasOutstanding(game, options.contract)) {
    propose(options.contract, contractAmount);
  }

  if (
    game.phase === Phase.POINT_ON &&
    options.contract === BetKind.PASS_LINE &&
    options.oddsMultiple > 0 &&
    !hasOutstanding(game, BetKind.PASS_ODDS)
  ) {
    const line = outstandingAmount(game, BetKind.PASS_LINE);
    const multiple = Math.min(options.oddsMultiple, game.maxOddsMultiple);
    propose(BetKind.PASS_ODDS, Math.floor(line * multiple));
  }

  if (options.fieldUnit > 0) {
    propose(BetKind.FIELD, options.fieldUnit);
  }

  return decisions;
}
