export enum StopReason {
  NONE = 'NONE',
  MAX_POINTS = 'MAX_POINTS',
  ALL_PLAYERS_BANKRUPT = 'ALL_PLAYERS_BANKRUPT',
  ALL_PLAYERS_RETIRED = 'ALL_PLAYERS_RETIRED',
  NO_ELIGIBLE_SHOOTER = 'NO_ELIGIBLE_SHOOTER',
  MAX_ROLLS = 'MAX_ROLLS',
}
