export interface BetSnapshot {
  betId: string;
  playerId: string;
  kind: string;
  amount: number;
  pointAtPlacement?: number;
}
