import { BetKind } from '@betting/domain/BetKind';

export type ContractKind = BetKind.PASS_LINE | BetKind.DONT_PASS;

export interface LineBettingOptions {
  unit: number;
  contract: ContractKind;
  /** Pass odds as a multiple of the pass-line stake; 0 disables odds. */
  oddsMultiple: number;
  /** Field stake placed before every roll; 0 disables field bets. */
  fieldUnit: number;
}

export type StrategyConfig =
  | ({ type: 'flat' } & LineBettingOptions)
  | ({ type: 'progressive'; maxDoublings: number } & LineBettingOptions)
  | { type: 'none' };
