export class SessionNotFoundError extends Error {
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} not found`);
    this.name = 'SessionNotFoundError';
  }
}

export class SessionBusyError extends Error {
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} is already handling a message`);
    this.name = 'SessionBusyError';
  }
}

export class RuleTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RuleTableError';
  }
}

export class InvalidTransitionError extends Error {
  constructor(readonly from: string, readonly to: string) {
    super(`Invalid conversation transition ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}
