import { FlatStrategy } from '@strategy/domain/FlatStrategy';
import { NullStrategy } from '@strategy/domain/NullStrategy';
import { ProgressiveStrategy } from '@strategy/domain/ProgressiveStrategy';
import { Strategy } from '@strategy/domain/Strategy';
import { StrategyConfig } from '@strategy/domain/StrategyConfig';
import { InvalidConfigurationError } from '@shared/kernel/DomainError';

export function createStrategy(config: StrategyConfig): Strategy {
  switch (config.type) {
    case 'none':
      return new NullStrategy();
    case 'flat':
      assertUnit(config.unit);
      return new FlatStrategy(config);
    case 'progressive':
      assertUnit(config.unit);
      if (!Number.isInteger(config.maxDoublings) || config.maxDoublings < 0) {
        throw new InvalidConfigurationError('maxDoublings must be a non-negative integer');
      }
      return new ProgressiveStrategy(config, config.maxDoublings);
  }
}

function assertUnit(unit: number): void {
  if (!Number.isInteger(unit) || unit <= 0) {
    throw new InvalidConfigurationError(`Strategy unit must be a positive integer, got ${unit}`);
  }
}
