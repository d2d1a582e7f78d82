export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidChipsError extends DomainError {}
export class InvalidOutcomeError extends DomainError {}
export class InvalidAmountError extends DomainError {}
export class InvalidStateTransition extends DomainError {}
export class InvalidConfigurationError extends DomainError {}
export class InvalidSeedError extends DomainError {}
