import { BetOutcome } from '@betting/domain/BetKind';
import { DebitResult } from '@player/domain/DebitResult';
import { PlayerView } from '@player/domain/PlayerView';
import { Chips } from '@shared/kernel/Chips';
import { InvalidAmountError, InvalidConfigurationError } from '@shared/kernel/DomainError';

export interface PlayerAccountOptions {
  id: string;
  name: string;
  strategyName: string;
  startingBankroll: number;
  canShoot?: boolean;
  /** Stop betting once the bankroll falls to or below this. */
  stopLoss?: number;
  /** Stop betting once the bankroll reaches or exceeds this. */
  stopWin?: number;
}

export class PlayerAccount {
  readonly id: string;
  readonly name: string;
  readonly strategyName: string;
  readonly canShoot: boolean;
  readonly stopLoss?: number;
  readonly stopWin?: number;
  private readonly starting: Chips;
  private _bankroll: Chips;
  private _isShooter = false;
  private _shooterProfit = 0;
  private _pointsPlayedAsShooter = 0;
  private _consecutiveLosses = 0;
  private _lastOutcome?: BetOutcome;
  private _wins = 0;
  private _losses = 0;
  private _pushes = 0;
  private _totalWagered = 0;

  constructor(options: PlayerAccountOptions) {
    if (options.name.trim().length === 0) {
      throw new InvalidConfigurationError('Player name cannot be empty');
    }
    if (options.stopWin !== undefined && options.stopWin <= options.startingBankroll) {
      throw new InvalidConfigurationError(
        `stopWin for ${options.name} must exceed the starting bankroll`,
      );
    }
    this.id = options.id;
    this.name = options.name;
    this.strategyName = options.strategyName;
    this.canShoot = options.canShoot ?? true;
    this.stopLoss = options.stopLoss;
    this.stopWin = options.stopWin;
    this.starting = Chips.of(options.startingBankroll);
    this._bankroll = this.starting;
  }

  get bankroll(): number {
    return this._bankroll.toNumber();
  }

  get startingBankroll(): number {
    return this.starting.toNumber();
  }

  get totalProfit(): number {
    return this.bankroll - this.startingBankroll;
  }

  get shooterProfit(): number {
    return this._shooterProfit;
  }

  get pointsPlayedAsShooter(): number {
    return this._pointsPlayedAsShooter;
  }

  get consecutiveLosses(): number {
    return this._consecutiveLosses;
  }

  get wins(): number {
    return this._wins;
  }

  get losses(): number {
    return this._losses;
  }

  get pushes(): number {
    return this._pushes;
  }

  get totalWagered(): number {
    return this._totalWagered;
  }

  debit(amount: number): DebitResult {
    if (!Number.isInteger(amount) || amount <= 0) {
      throw new InvalidAmountError(`Debit must be a positive integer, got ${amount}`);
    }
    const stake = Chips.of(amount);
    if (stake.isGreaterThan(this._bankroll)) {
      return { success: false, error: 'INSUFFICIENT_FUNDS' };
    }

    this._bankroll = this._bankroll.subtract(stake);
    this._totalWagered += amount;
    if (this._isShooter) this._shooterProfit -= amount;
    return { success: true, bankroll: this.bankroll };
  }

  credit(amount: number): void {
    if (!Number.isInteger(amount) || amount < 0) {
      throw new InvalidAmountError(`Credit must be a non-negative integer, got ${amount}`);
    }
    this._bankroll = this._bankroll.add(Chips.of(amount));
    if (this._isShooter) this._shooterProfit += amount;
  }

  recordResolution(outcome: BetOutcome): void {
    this._lastOutcome = outcome;
    switch (outcome) {
      case BetOutcome.WIN:
        this._wins++;
        this._consecutiveLosses = 0;
        break;
      case BetOutcome.LOSE:
        this._losses++;
        this._consecutiveLosses++;
        break;
      case BetOutcome.PUSH:
        this._pushes++;
        break;
    }
  }

  takeDice(): void {
    this._isShooter = true;
  }

  passDice(): void {
    this._isShooter = false;
  }

  recordPointAsShooter(): void {
    this._pointsPlayedAsShooter++;
  }

  isBankrupt(tableMinimum: number): boolean {
    return this.bankroll < tableMinimum;
  }

  isRetired(): boolean {
    if (this.stopLoss !== undefined && this.bankroll <= this.stopLoss) return true;
    if (this.stopWin !== undefined && this.bankroll >= this.stopWin) return true;
    return false;
  }

  view(): PlayerView {
    return Object.freeze({
      id: this.id,
      name: this.name,
      strategyName: this.strategyName,
      bankroll: this.bankroll,
      startingBankroll: this.startingBankroll,
      consecutiveLosses: this._consecutiveLosses,
      lastOutcome: this._lastOutcome,
      wins: this._wins,
      losses: this._losses,
      pushes: this._pushes,
      shooterProfit: this._shooterProfit,
      pointsPlayedAsShooter: this._pointsPlayedAsShooter,
      totalWagered: this._totalWagered,
    });
  }
}
