import { BetDecision, Strategy } from '@strategy/domain/Strategy';

export class NullStrategy implements Strategy {
  readonly name = 'none';

  decide(): BetDecision[] {
    return [];
  }
}
