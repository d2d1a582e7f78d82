import { BetLedger } from '@betting/domain/BetLedger';
import { toBetSnapshot } from '@betting/application/mappers/toBetSnapshot';
import { RoundEngine } from '@engine/domain/RoundEngine';
import { Phase } from '@engine/domain/Phase';
import { RoundResult } from '@engine/domain/RoundResult';
import { PlayerAccount } from '@player/domain/PlayerAccount';
import { PlayerView } from '@player/domain/PlayerView';
import { DiceSource } from '@rng/application/ports/DiceSource';
import { PointNumber } from '@rng/domain/DiceOutcome';
import { BetSnapshot } from '@shared/kernel/BetSnapshot';
import {
  InvalidAmountError,
  InvalidConfigurationError,
  InvalidStateTransition,
} from '@shared/kernel/DomainError';
import { Logger } from '@shared/ports/Logger';
import { FrameObserver, FrameStage } from '@simulation/application/ports/FrameObserver';
import { PlayerConfig, SimulationConfig } from '@simulation/domain/SimulationConfig';
import {
  RejectedBet,
  ResolvedBetSnapshot,
  SimulationEvent,
} from '@simulation/domain/SimulationEvent';
import { SimulationResult } from '@simulation/domain/SimulationResult';
import { StopReason } from '@simulation/domain/StopReason';
import { createStrategy } from '@strategy/domain/createStrategy';
import { GameView } from '@strategy/domain/GameView';
import { Strategy } from '@strategy/domain/Strategy';

interface Seat {
  account: PlayerAccount;
  strategy: Strategy;
}

/**
 * Drives one run: bets, roll, resolution, payouts, shooter rotation and
 * stop evaluation, once per roll, strictly in that order. A run owns its
 * engine, ledger, accounts and dice source; nothing is shared between
 * instances.
 */
export class Simulation {
  private readonly engine = new RoundEngine();
  private readonly ledger: BetLedger;
  private readonly seats: Seat[];
  private _rollIndex = 0;
  private _shooterIndex: number;
  private _shooterRollIndex = 0;
  private _stopReason: StopReason = StopReason.NONE;
  private started = false;

  constructor(
    private readonly config: SimulationConfig,
    private readonly dice: DiceSource,
    private readonly logger: Logger,
    strategyFor: (player: PlayerConfig) => Strategy = (player) => createStrategy(player.strategy),
  ) {
    if (config.players.length === 0) {
      throw new InvalidConfigurationError('At least one player is required');
    }
    if (!config.players.some((p) => p.canShoot)) {
      throw new InvalidConfigurationError('At least one player must be allowed to shoot');
    }
    if (!Number.isInteger(config.targetPoints) || config.targetPoints <= 0) {
      throw new InvalidConfigurationError('targetPoints must be a positive integer');
    }
    if (!Number.isInteger(config.maxRolls) || config.maxRolls < 0) {
      throw new InvalidConfigurationError('maxRolls must be a non-negative integer');
    }

    this.ledger = new BetLedger(config.table);
    this.seats = config.players.map((player, index) => ({
      account: new PlayerAccount({
        id: `player-${index + 1}`,
        name: player.name,
        strategyName: player.strategy.type,
        startingBankroll: player.bankroll,
        canShoot: player.canShoot,
        stopLoss: player.stopLoss,
        stopWin: player.stopWin,
      }),
      strategy: strategyFor(player),
    }));

    const firstEligible = this.seats.findIndex((seat) => this.isEligibleShooter(seat.account));
    this._shooterIndex =
      firstEligible >= 0 ? firstEligible : this.seats.findIndex((seat) => seat.account.canShoot);
    this.seats[this._shooterIndex].account.takeDice();
  }

  get phase(): Phase {
    return this.engine.phase;
  }

  get point(): PointNumber | undefined {
    return this.engine.point;
  }

  get completedPoints(): number {
    return this.engine.completedPoints;
  }

  get rollIndex(): number {
    return this._rollIndex;
  }

  get shooterIndex(): number {
    return this._shooterIndex;
  }

  get shooterRollIndex(): number {
    return this._shooterRollIndex;
  }

  get stopReason(): StopReason {
    return this._stopReason;
  }

  get players(): PlayerView[] {
    return this.seats.map((seat) => seat.account.view());
  }

  bankrollOf(playerId: string): number | undefined {
    return this.seats.find((seat) => seat.account.id === playerId)?.account.bankroll;
  }

  outstandingBets(): BetSnapshot[] {
    return this.ledger.outstanding().map(toBetSnapshot);
  }

  run(maxRolls?: number, onFrame?: FrameObserver): SimulationResult {
    if (this.started) {
      throw new InvalidStateTransition('Simulation has already been run');
    }
    if (maxRolls !== undefined && (!Number.isInteger(maxRolls) || maxRolls < 0)) {
      throw new InvalidConfigurationError(
        `maxRolls must be a non-negative integer, got ${maxRolls}`,
      );
    }
    this.started = true;

    const rollGuard =
      maxRolls === undefined ? this.config.maxRolls : Math.min(maxRolls, this.config.maxRolls);
    const events: SimulationEvent[] = [];

    this.logger.info('Simulation started', {
      players: this.seats.length,
      targetPoints: this.config.targetPoints,
      maxRolls: rollGuard,
    });

    let stopReason = this.evaluateStop(rollGuard);
    this.emit(onFrame, 'initial');

    while (stopReason === StopReason.NONE) {
      events.push(this.playRoll(onFrame));
      stopReason = this.evaluateStop(rollGuard);
    }

    this._stopReason = stopReason;
    this.logger.info('Simulation stopped', {
      stopReason,
      rolls: this._rollIndex,
      completedPoints: this.engine.completedPoints,
    });

    return {
      events: Object.freeze(events),
      completedPoints: this.engine.completedPoints,
      stopReason,
      rollCount: this._rollIndex,
      players: this.players,
      outstandingBets: Object.freeze(this.outstandingBets()),
    };
  }

  private playRoll(onFrame?: FrameObserver): SimulationEvent {
    this._rollIndex++;
    this._shooterRollIndex++;

    const rejected = this.takeBets();
    this.emit(onFrame, 'after_bets');

    const outcome = this.dice.roll();
    const result = this.engine.roll(outcome);
    this.emit(onFrame, 'after_roll', result);

    const resolved = this.settle(result);

    const shooterIndex = this._shooterIndex;
    const shooter = this.seats[shooterIndex].account;
    const shooterRollIndex = this._shooterRollIndex;
    const shooterProfit = shooter.shooterProfit;
    if (result.completedPoint) {
      shooter.recordPointAsShooter();
    }
    if (this.shouldPassDice(result, shooter)) {
      this.passDice();
    }

    const event: SimulationEvent = Object.freeze({
      rollIndex: this._rollIndex,
      shooterIndex,
      shooterRollIndex,
      outcome: Object.freeze({ die1: outcome.die1, die2: outcome.die2, total: outcome.total }),
      state: this.engine.snapshot(),
      facts: Object.freeze({
        phaseBefore: result.phaseBefore,
        pointEstablished: result.pointEstablished,
        completedPoint: result.completedPoint,
        sevenOut: result.sevenOut,
        natural: result.natural,
        craps: result.craps,
      }),
      resolvedBets: Object.freeze(resolved),
      rejectedBets: Object.freeze(rejected),
      outstandingBets: Object.freeze(this.outstandingBets()),
      bankrolls: Object.freeze(this.seats.map((seat) => seat.account.bankroll)),
      shooterProfit,
    });

    this.emit(onFrame, 'after_payouts', result, event);
    return event;
  }

  private takeBets(): RejectedBet[] {
    const rejected: RejectedBet[] = [];
    const minBet = this.config.table.minBet;

    for (const { account, strategy } of this.seats) {
      if (account.isBankrupt(minBet) || account.isRetired()) continue;

      const decisions = strategy.decide(this.gameViewFor(account.id), account.view());
      for (const decision of decisions) {
        const placed = this.ledger.place({
          playerId: account.id,
          kind: decision.kind,
          amount: decision.amount,
          point: this.engine.point,
        });

        if (!placed.success) {
          if (placed.error === 'INVALID_AMOUNT') {
            throw new InvalidAmountError(
              `Strategy ${strategy.name} proposed ${decision.amount} on ${decision.kind}`,
            );
          }
          rejected.push(this.reject(account.id, decision.kind, decision.amount, placed.error));
          continue;
        }

        const debit = account.debit(decision.amount);
        if (!debit.success) {
          this.ledger.remove(placed.bet.id);
          rejected.push(this.reject(account.id, decision.kind, decision.amount, debit.error));
        }
      }
    }

    return rejected;
  }

  private reject(
    playerId: string,
    kind: string,
    amount: number,
    error: RejectedBet['error'],
  ): RejectedBet {
    this.logger.debug('Bet rejected', { rollIndex: this._rollIndex, playerId, kind, amount, error });
    return Object.freeze({ playerId, kind, amount, error });
  }

  private settle(result: RoundResult): ResolvedBetSnapshot[] {
    const snapshots: ResolvedBetSnapshot[] = [];

    for (const resolved of this.ledger.resolveOnRoundResult(result)) {
      const account = this.accountOf(resolved.bet.playerId);
      const payout = resolved.payout.toNumber();
      if (payout > 0) account.credit(payout);
      account.recordResolution(resolved.outcome);
      snapshots.push(
        Object.freeze({ ...toBetSnapshot(resolved.bet), outcome: resolved.outcome, payout }),
      );
    }

    return snapshots;
  }

  private shouldPassDice(result: RoundResult, shooter: PlayerAccount): boolean {
    if (!this.isEligibleShooter(shooter)) return true;
    if (this.config.shooterRotation === 'seven-out') return result.sevenOut;
    return result.completedPoint;
  }

  private passDice(): void {
    const count = this.seats.length;
    for (let offset = 1; offset <= count; offset++) {
      const candidate = (this._shooterIndex + offset) % count;
      if (!this.isEligibleShooter(this.seats[candidate].account)) continue;

      this.seats[this._shooterIndex].account.passDice();
      this._shooterIndex = candidate;
      this.seats[candidate].account.takeDice();
      this._shooterRollIndex = 0;
      return;
    }
  }

  private evaluateStop(rollGuard: number): StopReason {
    const minBet = this.config.table.minBet;

    if (this.engine.completedPoints >= this.config.targetPoints) {
      return StopReason.MAX_POINTS;
    }
    if (this.seats.every(({ account }) => account.isBankrupt(minBet))) {
      return StopReason.ALL_PLAYERS_BANKRUPT;
    }
    if (this.seats.every(({ account }) => account.isBankrupt(minBet) || account.isRetired())) {
      return StopReason.ALL_PLAYERS_RETIRED;
    }
    if (!this.seats.some(({ account }) => this.isEligibleShooter(account))) {
      return StopReason.NO_ELIGIBLE_SHOOTER;
    }
    if (this._rollIndex >= rollGuard) {
      return StopReason.MAX_ROLLS;
    }
    return StopReason.NONE;
  }

  private isEligibleShooter(account: PlayerAccount): boolean {
    return (
      account.canShoot && !account.isBankrupt(this.config.table.minBet) && !account.isRetired()
    );
  }

  private accountOf(playerId: string): PlayerAccount {
    const seat = this.seats.find((s) => s.account.id === playerId);
    if (!seat) {
      throw new InvalidStateTransition(`Bet owner ${playerId} is not seated`);
    }
    return seat.account;
  }

  private gameViewFor(playerId: string): GameView {
    return Object.freeze({
      phase: this.engine.phase,
      point: this.engine.point,
      rollIndex: this._rollIndex,
      minBet: this.config.table.minBet,
      maxBet: this.config.table.maxBet,
      maxOddsMultiple: this.config.table.maxOddsMultiple,
      outstanding: this.ledger
        .outstandingFor(playerId)
        .map((bet) => Object.freeze({ kind: bet.kind, amount: bet.amount.toNumber() })),
    });
  }

  private emit(
    onFrame: FrameObserver | undefined,
    stage: FrameStage,
    roundResult?: RoundResult,
    event?: SimulationEvent,
  ): void {
    if (!onFrame) return;
    onFrame({
      stage,
      rollIndex: this._rollIndex,
      shooterIndex: this._shooterIndex,
      phase: this.engine.phase,
      point: this.engine.point,
      completedPoints: this.engine.completedPoints,
      players: this.players,
      outstandingBets: this.outstandingBets(),
      roundResult,
      event,
    });
  }
}
