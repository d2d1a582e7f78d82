import { Bet } from '@betting/domain/Bet';
import { BetOutcome, Settlement } from '@betting/domain/BetKind';
import { Chips } from '@shared/kernel/Chips';

export interface ResolvedBet {
  readonly bet: Bet;
  readonly outcome: BetOutcome;
  /** Chips handed back: stake plus winnings, the stake on a push, nothing on a loss. */
  readonly payout: Chips;
}

function payoutFor(bet: Bet, settlement: Settlement): Chips {
  switch (settlement.outcome) {
    case BetOutcome.WIN:
      return bet.amount.add(
        bet.amount.multiplyRatio(settlement.numerator, settlement.denominator),
      );
    case BetOutcome.PUSH:
      return bet.amount;
    case BetOutcome.LOSE:
      return Chips.zero();
  }
}

export function toResolvedBet(bet: Bet, settlement: Settlement): ResolvedBet {
  return Object.freeze({
    bet,
    outcome: settlement.outcome,
    payout: payoutFor(bet, settlement),
  });
}
