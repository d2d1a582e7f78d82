import { BetKind, BetOutcome } from '@betting/domain/BetKind';
import { Phase } from '@engine/domain/Phase';
import { SeededDiceSource } from '@rng/infrastructure/SeededDiceSource';
import {
  InvalidAmountError,
  InvalidConfigurationError,
  InvalidStateTransition,
} from '@shared/kernel/DomainError';
import { FrameStage } from '@simulation/application/ports/FrameObserver';
import { Simulation } from '@simulation/application/Simulation';
import { PlayerConfig, SimulationConfig } from '@simulation/domain/SimulationConfig';
import { StopReason } from '@simulation/domain/StopReason';
import { summarizeRun } from '@stats/domain/RunSummary';
import { Strategy } from '@strategy/domain/Strategy';
import { LineBettingOptions, StrategyConfig } from '@strategy/domain/StrategyConfig';
import { ScriptedDiceSource } from '../helpers/ScriptedDiceSource';
import { silentLogger } from '../helpers/silent-logger';

const line: LineBettingOptions = {
  unit: 10,
  contract: BetKind.PASS_LINE,
  oddsMultiple: 0,
  fieldUnit: 0,
};

const flat = (unit = 10): StrategyConfig => ({ type: 'flat', ...line, unit });

const alice = (overrides?: Partial<PlayerConfig>): PlayerConfig => ({
  name: 'Alice',
  bankroll: 100,
  canShoot: true,
  strategy: flat(),
  ...overrides,
});

const bob = (overrides?: Partial<PlayerConfig>): PlayerConfig =>
  alice({ name: 'Bob', ...overrides });

const makeConfig = (overrides?: Partial<SimulationConfig>): SimulationConfig => ({
  table: { minBet: 10, maxBet: 500, maxOddsMultiple: 2 },
  targetPoints: 1,
  maxRolls: 100,
  shooterRotation: 'point-completed',
  players: [alice()],
  ...overrides,
});

const simulate = (
  config: SimulationConfig,
  rolls: Array<[number, number]>,
  logger = silentLogger(),
) => new Simulation(config, new ScriptedDiceSource(rolls), logger);

const passLineOf = (amount: number): Strategy => ({
  name: 'fixed',
  decide: () => [{ kind: BetKind.PASS_LINE, amount }],
});

describe('Simulation', () => {
  describe('construction', () => {
    it('requires at least one player', () => {
      expect(() => simulate(makeConfig({ players: [] }), [])).toThrow(
        'At least one player is required',
      );
    });

    it('requires someone who may shoot', () => {
      expect(() => simulate(makeConfig({ players: [alice({ canShoot: false })] }), [])).toThrow(
        InvalidConfigurationError,
      );
    });

    it('hands the dice to the first eligible seat', () => {
      const sim = simulate(
        makeConfig({ players: [alice({ canShoot: false }), bob(), alice({ name: 'Carol' })] }),
        [],
      );
      expect(sim.shooterIndex).toBe(1);
      expect(sim.phase).toBe(Phase.COME_OUT);
      expect(sim.rollIndex).toBe(0);
    });
  });

  describe('a pass-line run', () => {
    const rolls: Array<[number, number]> = [
      [3, 4],
      [2, 2],
      [5, 5],
      [1, 3],
    ];

    it('plays until the target number of points is made', () => {
      const result = simulate(makeConfig(), rolls).run();

      expect(result.stopReason).toBe(StopReason.MAX_POINTS);
      expect(result.rollCount).toBe(4);
      expect(result.completedPoints).toBe(1);
      expect(result.events.map((e) => e.bankrolls[0])).toEqual([110, 100, 100, 120]);
    });

    it('reports the final player state', () => {
      const [player] = simulate(makeConfig(), rolls).run().players;

      expect(player).toMatchObject({
        id: 'player-1',
        name: 'Alice',
        strategyName: 'flat',
        bankroll: 120,
        wins: 2,
        losses: 0,
        totalWagered: 20,
        shooterProfit: 20,
        pointsPlayedAsShooter: 1,
      });
    });

    it('records bets, resolutions and engine state per roll', () => {
      const { events } = simulate(makeConfig(), rolls).run();

      expect(events[0].resolvedBets).toEqual([
        {
          betId: 'player-1:PASS_LINE:1',
          playerId: 'player-1',
          kind: BetKind.PASS_LINE,
          amount: 10,
          outcome: BetOutcome.WIN,
          payout: 20,
        },
      ]);
      expect(events[0].facts.natural).toBe(true);

      expect(events[1].facts.pointEstablished).toBe(4);
      expect(events[1].state).toEqual({ phase: Phase.POINT_ON, point: 4, completedPoints: 0 });
      expect(events[1].outstandingBets.map((b) => b.betId)).toEqual(['player-1:PASS_LINE:2']);

      expect(events[2].resolvedBets).toEqual([]);
      expect(events[3].facts.completedPoint).toBe(true);
      expect(events[3].shooterRollIndex).toBe(4);
      expect(events[3].shooterProfit).toBe(20);
    });

    it('freezes every event', () => {
      const { events } = simulate(makeConfig(), rolls).run();
      expect(events.every((e) => Object.isFrozen(e) && Object.isFrozen(e.bankrolls))).toBe(true);
      expect(events[1].outstandingBets).toHaveLength(1);
      expect(
        events.every((e) => e.outstandingBets.every((bet) => Object.isFrozen(bet))),
      ).toBe(true);
      expect(
        events.every((e) => e.resolvedBets.every((bet) => Object.isFrozen(bet))),
      ).toBe(true);
    });

    it('exposes the stop reason and bankrolls once finished', () => {
      const sim = simulate(makeConfig(), rolls);
      expect(sim.stopReason).toBe(StopReason.NONE);

      sim.run();

      expect(sim.stopReason).toBe(StopReason.MAX_POINTS);
      expect(sim.bankrollOf('player-1')).toBe(120);
      expect(sim.bankrollOf('player-9')).toBeUndefined();
    });

    it('logs the start and the stop', () => {
      const logger = silentLogger();
      simulate(makeConfig(), rolls, logger).run();

      expect(logger.info).toHaveBeenCalledWith('Simulation started', {
        players: 1,
        targetPoints: 1,
        maxRolls: 100,
      });
      expect(logger.info).toHaveBeenCalledWith('Simulation stopped', {
        stopReason: StopReason.MAX_POINTS,
        rolls: 4,
        completedPoints: 1,
      });
    });
  });

  describe('stop conditions', () => {
    it('checks once before the first roll', () => {
      const dice = new ScriptedDiceSource([]);
      const sim = new Simulation(
        makeConfig({ players: [alice({ bankroll: 5 })] }),
        dice,
        silentLogger(),
      );

      const result = sim.run();

      expect(result.stopReason).toBe(StopReason.ALL_PLAYERS_BANKRUPT);
      expect(result.events).toEqual([]);
      expect(dice.consumed).toBe(0);
    });

    it('stops when every player is broke', () => {
      const result = simulate(makeConfig({ players: [alice({ bankroll: 10 })] }), [[1, 1]]).run();
      expect(result.stopReason).toBe(StopReason.ALL_PLAYERS_BANKRUPT);
      expect(result.rollCount).toBe(1);
    });

    it('reports stakes still on the table at the stop', () => {
      const result = simulate(makeConfig({ players: [alice({ bankroll: 10 })] }), [[2, 2]]).run();

      expect(result.stopReason).toBe(StopReason.ALL_PLAYERS_BANKRUPT);
      expect(result.outstandingBets).toEqual([
        { betId: 'player-1:PASS_LINE:1', playerId: 'player-1', kind: BetKind.PASS_LINE, amount: 10 },
      ]);
      expect(summarizeRun(result).outstandingStake).toBe(10);
    });

    it('stops when every player has retired', () => {
      const result = simulate(makeConfig({ players: [alice({ stopLoss: 100 })] }), []).run();
      expect(result.stopReason).toBe(StopReason.ALL_PLAYERS_RETIRED);
    });

    it('stops when nobody left may shoot', () => {
      const config = makeConfig({
        players: [alice({ bankroll: 10 }), bob({ canShoot: false })],
      });
      const result = simulate(config, [[1, 1]]).run();

      expect(result.stopReason).toBe(StopReason.NO_ELIGIBLE_SHOOTER);
      expect(result.events[0].bankrolls).toEqual([0, 90]);
    });

    it('honours the roll guard', () => {
      const result = simulate(makeConfig({ maxRolls: 2 }), [
        [3, 3],
        [3, 4],
      ]).run();

      expect(result.stopReason).toBe(StopReason.MAX_ROLLS);
      expect(result.rollCount).toBe(2);
      expect(result.players[0].bankroll).toBe(90);
    });

    it('rejects a roll guard that is not a non-negative integer', () => {
      const config = makeConfig({ maxRolls: 2 });
      expect(() => simulate(config, [[3, 3], [3, 3], [3, 3]]).run(Number.NaN)).toThrow(
        InvalidConfigurationError,
      );
      expect(() => simulate(config, []).run(-1)).toThrow(InvalidConfigurationError);
      expect(() => simulate(config, []).run(1.5)).toThrow(InvalidConfigurationError);
    });

    it('uses the smaller of the run and configured roll guards', () => {
      const result = simulate(makeConfig({ maxRolls: 5 }), [
        [2, 2],
        [5, 5],
        [5, 5],
      ]).run(1);
      expect(result.rollCount).toBe(1);
    });
  });

  describe('shooter rotation', () => {
    it('passes the dice after a made point by default', () => {
      const config = makeConfig({ targetPoints: 5, maxRolls: 3, players: [alice(), bob()] });
      const { events } = simulate(config, [
        [2, 2],
        [1, 3],
        [3, 4],
      ]).run();

      expect(events.map((e) => [e.shooterIndex, e.shooterRollIndex])).toEqual([
        [0, 1],
        [0, 2],
        [1, 1],
      ]);
    });

    it('can pass the dice on a seven-out instead', () => {
      const config = makeConfig({
        targetPoints: 5,
        maxRolls: 5,
        shooterRotation: 'seven-out',
        players: [alice(), bob()],
      });
      const { events } = simulate(config, [
        [2, 2],
        [1, 3],
        [3, 3],
        [3, 4],
        [5, 6],
      ]).run();

      expect(events.map((e) => e.shooterIndex)).toEqual([0, 0, 0, 0, 1]);
    });

    it('takes the dice away from a shooter who goes broke', () => {
      const config = makeConfig({ maxRolls: 2, players: [alice({ bankroll: 10 }), bob()] });
      const { events } = simulate(config, [
        [1, 1],
        [3, 4],
      ]).run();

      expect(events.map((e) => e.shooterIndex)).toEqual([0, 1]);
      expect(events[1].bankrolls).toEqual([0, 100]);
    });

    it('credits points to the shooter who made them', () => {
      const config = makeConfig({ targetPoints: 2, players: [alice(), bob()] });
      const result = simulate(config, [
        [2, 2],
        [1, 3],
        [4, 5],
        [3, 6],
      ]).run();

      expect(result.players.map((p) => p.pointsPlayedAsShooter)).toEqual([1, 1]);
    });
  });

  describe('rejected bets', () => {
    it('records and logs a decision the table refuses', () => {
      const logger = silentLogger();
      const config = makeConfig({
        maxRolls: 1,
        players: [alice({ bankroll: 1000, strategy: flat(600) })],
      });

      const { events } = simulate(config, [[3, 4]], logger).run();

      expect(events[0].rejectedBets).toEqual([
        { playerId: 'player-1', kind: BetKind.PASS_LINE, amount: 600, error: 'ABOVE_TABLE_MAXIMUM' },
      ]);
      expect(events[0].bankrolls).toEqual([1000]);
      expect(logger.debug).toHaveBeenCalledWith('Bet rejected', {
        rollIndex: 1,
        playerId: 'player-1',
        kind: BetKind.PASS_LINE,
        amount: 600,
        error: 'ABOVE_TABLE_MAXIMUM',
      });
    });
  });

  describe('custom strategies', () => {
    it('aborts the run on a non-positive proposal', () => {
      const sim = new Simulation(
        makeConfig(),
        new ScriptedDiceSource([[3, 4]]),
        silentLogger(),
        () => passLineOf(0),
      );

      expect(() => sim.run()).toThrow(InvalidAmountError);
    });

    it('withdraws a bet the bankroll cannot cover', () => {
      const sim = new Simulation(
        makeConfig({ maxRolls: 1 }),
        new ScriptedDiceSource([[3, 3]]),
        silentLogger(),
        () => passLineOf(200),
      );

      const { events } = sim.run();

      expect(events[0].rejectedBets).toEqual([
        { playerId: 'player-1', kind: BetKind.PASS_LINE, amount: 200, error: 'INSUFFICIENT_FUNDS' },
      ]);
      expect(events[0].outstandingBets).toEqual([]);
      expect(events[0].bankrolls).toEqual([100]);
      expect(sim.outstandingBets()).toEqual([]);
      expect(sim.players[0].totalWagered).toBe(0);
    });
  });

  describe('observer', () => {
    it('is called at each stage in order', () => {
      const stages: FrameStage[] = [];
      simulate(makeConfig({ maxRolls: 1 }), [[3, 4]]).run(undefined, (frame) => {
        stages.push(frame.stage);
      });

      expect(stages).toEqual(['initial', 'after_bets', 'after_roll', 'after_payouts']);
    });

    it('sees the stake taken before the roll', () => {
      const bankrolls: number[] = [];
      simulate(makeConfig({ maxRolls: 1 }), [[3, 4]]).run(undefined, (frame) => {
        bankrolls.push(frame.players[0].bankroll);
      });

      expect(bankrolls).toEqual([100, 90, 90, 110]);
    });

    it('aborts the run when it throws', () => {
      const sim = simulate(makeConfig(), [[3, 4]]);
      expect(() =>
        sim.run(undefined, (frame) => {
          if (frame.stage === 'after_roll') throw new Error('render failed');
        }),
      ).toThrow('render failed');
    });
  });

  it('runs only once', () => {
    const sim = simulate(makeConfig(), [[3, 4], [2, 2], [1, 3]]);
    sim.run();
    expect(() => sim.run()).toThrow(InvalidStateTransition);
  });

  describe('with seeded dice', () => {
    const config = makeConfig({
      targetPoints: 5,
      maxRolls: 300,
      players: [
        alice({
          bankroll: 500,
          strategy: { type: 'flat', ...line, oddsMultiple: 2, fieldUnit: 10 },
        }),
        bob({ bankroll: 300, strategy: { type: 'progressive', ...line, maxDoublings: 3 } }),
        alice({
          name: 'Carol',
          canShoot: false,
          strategy: { type: 'flat', ...line, contract: BetKind.DONT_PASS },
        }),
      ],
    });

    const play = () =>
      new Simulation(config, new SeededDiceSource('test-seed'), silentLogger()).run();

    it('produces identical event logs for the same seed', () => {
      expect(JSON.stringify(play())).toBe(JSON.stringify(play()));
    });

    it('keeps every bankroll consistent with stakes and payouts', () => {
      const result = play();

      result.players.forEach((player) => {
        const paid = result.events
          .flatMap((e) => e.resolvedBets)
          .filter((bet) => bet.playerId === player.id)
          .reduce((sum, bet) => sum + bet.payout, 0);

        expect(player.bankroll).toBe(player.startingBankroll - player.totalWagered + paid);
      });
      for (const event of result.events) {
        for (const bankroll of event.bankrolls) expect(bankroll).toBeGreaterThanOrEqual(0);
      }
    });

    it('resolves each bet at most once', () => {
      const ids = play()
        .events.flatMap((e) => e.resolvedBets)
        .map((bet) => bet.betId);
      expect(new Set(ids).size).toBe(ids.length);
    });
  });
});
