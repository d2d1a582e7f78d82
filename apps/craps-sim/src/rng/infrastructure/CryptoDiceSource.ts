import { randomInt } from 'crypto';
import { DiceOutcome } from '@rng/domain/DiceOutcome';
import { DiceSource, DiceSourceFactory } from '@rng/application/ports/DiceSource';

export class CryptoDiceSource implements DiceSource {
  roll(): DiceOutcome {
    // upper bound is exclusive
    return DiceOutcome.of(randomInt(1, 7), randomInt(1, 7));
  }
}

export class CryptoDiceSourceFactory implements DiceSourceFactory {
  create(): DiceSource {
    return new CryptoDiceSource();
  }
}
