import { DiceOutcome } from '@rng/domain/DiceOutcome';
import { SeededDice } from '@rng/domain/SeededDice';
import { DiceSource, DiceSourceFactory } from '@rng/application/ports/DiceSource';

export class SeededDiceSource implements DiceSource {
  private nonce = 0;

  constructor(
    private readonly seed: string,
    private readonly stream: number = 0,
  ) {
    SeededDice.assertSeed(seed);
  }

  roll(): DiceOutcome {
    const [die1, die2] = SeededDice.faces(this.seed, this.stream, this.nonce);
    this.nonce++;
    return DiceOutcome.of(die1, die2);
  }

  fork(stream: number): SeededDiceSource {
    return new SeededDiceSource(this.seed, stream);
  }

  get rolls(): number {
    return this.nonce;
  }
}

/** Run `i` of a batch draws from stream `i` of the same seed. */
export class SeededDiceSourceFactory implements DiceSourceFactory {
  private readonly root: SeededDiceSource;

  constructor(seed: string) {
    this.root = new SeededDiceSource(seed);
  }

  create(runIndex: number): DiceSource {
    return this.root.fork(runIndex);
  }
}
