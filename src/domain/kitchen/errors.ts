export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class LastOwnerError extends DomainError {
  constructor(message = 'A kitchen must retain at least one owner') {
    super(message);
  }
}
