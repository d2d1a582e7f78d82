import { SeededDice } from '@rng/domain/SeededDice';
import { CryptoDiceSource, CryptoDiceSourceFactory } from '@rng/infrastructure/CryptoDiceSource';
import {
  SeededDiceSource,
  SeededDiceSourceFactory,
} from '@rng/infrastructure/SeededDiceSource';
import { InvalidSeedError } from '@shared/kernel/DomainError';

const draw = (source: { roll(): { toString(): string } }, count: number) =>
  Array.from({ length: count }, () => source.roll().toString());

describe('SeededDiceSource', () => {
  it('replays the same rolls for the same seed', () => {
    expect(draw(new SeededDiceSource('test-seed'), 30)).toEqual(
      draw(new SeededDiceSource('test-seed'), 30),
    );
  });

  it('walks the nonce from zero', () => {
    const source = new SeededDiceSource('test-seed', 2);
    const first = source.roll();
    const second = source.roll();

    expect([first.die1, first.die2]).toEqual(SeededDice.faces('test-seed', 2, 0));
    expect([second.die1, second.die2]).toEqual(SeededDice.faces('test-seed', 2, 1));
    expect(source.rolls).toBe(2);
  });

  it('fork starts a fresh stream', () => {
    const root = new SeededDiceSource('test-seed');
    root.roll();
    const fork = root.fork(3);

    expect(fork.rolls).toBe(0);
    expect(draw(fork, 10)).toEqual(draw(new SeededDiceSource('test-seed', 3), 10));
  });

  it('rejects a blank seed', () => {
    expect(() => new SeededDiceSource('')).toThrow(InvalidSeedError);
  });

  it('factory hands run i the stream i', () => {
    const factory = new SeededDiceSourceFactory('test-seed');
    expect(draw(factory.create(1), 10)).toEqual(draw(new SeededDiceSource('test-seed', 1), 10));
  });
});

describe('CryptoDiceSource', () => {
  it('rolls valid dice', () => {
    const source = new CryptoDiceSourceFactory().create();
    expect(source).toBeInstanceOf(CryptoDiceSource);
    for (let i = 0; i < 200; i++) {
      const { die1, die2, total } = source.roll();
      expect(die1).toBeGreaterThanOrEqual(1);
      expect(die2).toBeLessThanOrEqual(6);
      expect(total).toBe(die1 + die2);
    }
  });
});
