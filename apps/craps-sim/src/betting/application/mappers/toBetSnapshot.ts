import { Bet } from '@betting/domain/Bet';
import { BetSnapshot } from '@shared/kernel/BetSnapshot';

export function toBetSnapshot(bet: Bet): BetSnapshot {
  const snapshot: BetSnapshot = {
    betId: bet.id,
    playerId: bet.playerId,
    kind: bet.kind,
    amount: bet.amount.toNumber(),
  };
  if (bet.pointAtPlacement !== undefined) {
    snapshot.pointAtPlacement = bet.pointAtPlacement;
  }
  return Object.freeze(snapshot);
}
