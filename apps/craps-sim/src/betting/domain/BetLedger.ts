import { Bet } from '@betting/domain/Bet';
import { BetKind, betKindPriority, isStackable, settle } from '@betting/domain/BetKind';
import { ResolvedBet, toResolvedBet } from '@betting/domain/ResolvedBet';
import { PlaceBetCommand, PlaceBetResult } from '@betting/domain/PlaceBet';
import { RoundResult } from '@engine/domain/RoundResult';
import { Chips } from '@shared/kernel/Chips';
import { InvalidConfigurationError } from '@shared/kernel/DomainError';

export interface TableLimits {
  minBet: number;
  maxBet: number;
  /** Largest pass-odds bet as a multiple of the player's pass-line bet. */
  maxOddsMultiple: number;
}

/**
 * Outstanding bets at the table, keyed by id in placement order.
 *
 * Nothing here touches bankrolls: debiting a stake and crediting a
 * payout belong to the caller.
 */
export class BetLedger {
  private readonly bets: Map<string, Bet> = new Map();
  private nextSequence = 1;

  constructor(readonly limits: TableLimits) {
    if (!Number.isInteger(limits.minBet) || limits.minBet <= 0) {
      throw new InvalidConfigurationError(`minBet must be a positive integer, got ${limits.minBet}`);
    }
    if (!Number.isInteger(limits.maxBet) || limits.maxBet < limits.minBet) {
      throw new InvalidConfigurationError(
        `maxBet must be an integer >= minBet, got ${limits.maxBet}`,
      );
    }
    if (limits.maxOddsMultiple < 0) {
      throw new InvalidConfigurationError('maxOddsMultiple must be >= 0');
    }
  }

  place(command: PlaceBetCommand): PlaceBetResult {
    const { playerId, kind, amount } = command;

    if (!Number.isInteger(amount) || amount <= 0) {
      return { success: false, error: 'INVALID_AMOUNT' };
    }
    if (amount < this.limits.minBet) {
      return { success: false, error: 'BELOW_TABLE_MINIMUM' };
    }
    if (amount > this.limits.maxBet) {
      return { success: false, error: 'ABOVE_TABLE_MAXIMUM' };
    }
    if (!isStackable(kind) && this.hasBet(playerId, kind)) {
      return { success: false, error: 'DUPLICATE_BET' };
    }
    if (!this.isAllowed(command)) {
      return { success: false, error: 'BET_NOT_ALLOWED' };
    }

    const sequence = this.nextSequence++;
    const bet = new Bet(
      `${playerId}:${kind}:${sequence}`,
      playerId,
      kind,
      Chips.of(amount),
      sequence,
      kind === BetKind.PASS_ODDS ? command.point : undefined,
    );
    this.bets.set(bet.id, bet);
    return { success: true, bet };
  }

  hasBet(playerId: string, kind: BetKind): boolean {
    return this.findFirst(playerId, kind) !== undefined;
  }

  remove(betId: string): Bet | undefined {
    const bet = this.bets.get(betId);
    if (bet) this.bets.delete(betId);
    return bet;
  }

  resolveOnRoundResult(result: RoundResult): ResolvedBet[] {
    const resolved: ResolvedBet[] = [];

    for (const bet of this.inResolutionOrder()) {
      const settlement = settle(bet.kind, result, bet.pointAtPlacement);
      if (settlement === null) continue;
      this.bets.delete(bet.id);
      resolved.push(toResolvedBet(bet, settlement));
    }

    return resolved;
  }

  outstanding(): Bet[] {
    return Array.from(this.bets.values());
  }

  outstandingFor(playerId: string): Bet[] {
    return this.outstanding().filter((b) => b.playerId === playerId);
  }

  outstandingAmountFor(playerId: string): number {
    let total = 0;
    for (const bet of this.bets.values()) {
      if (bet.playerId === playerId) total += bet.amount.toNumber();
    }
    return total;
  }

  get size(): number {
    return this.bets.size;
  }

  private isAllowed(command: PlaceBetCommand): boolean {
    switch (command.kind) {
      case BetKind.PASS_LINE:
      case BetKind.DONT_PASS:
        return command.point === undefined;
      case BetKind.PASS_ODDS: {
        if (command.point === undefined) return false;
        const line = this.findFirst(command.playerId, BetKind.PASS_LINE);
        if (!line) return false;
        return command.amount <= line.amount.toNumber() * this.limits.maxOddsMultiple;
      }
      case BetKind.FIELD:
        return true;
    }
  }

  private findFirst(playerId: string, kind: BetKind): Bet | undefined {
    for (const bet of this.bets.values()) {
      if (bet.playerId === playerId && bet.kind === kind) return bet;
    }
    return undefined;
  }

  private inResolutionOrder(): Bet[] {
    return this.outstanding().sort(
      (a, b) => betKindPriority(a.kind) - betKindPriority(b.kind) || a.sequence - b.sequence,
    );
  }
}
