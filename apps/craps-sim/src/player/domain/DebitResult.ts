export type DebitResult =
  | { success: true; bankroll: number }
  | { success: false; error: 'INSUFFICIENT_FUNDS' };
