/**
 * Error taxonomy for the controller.
 *
 * Everything raised from the topic registry is fatal: it points at a topic
 * bookkeeping bug or a broker misconfiguration, never at a transient fault.
 */
export class ControllerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class DuplicateRegistrationError extends ControllerError {
  constructor(public readonly topic: string) {
    super(`Topic ${topic} already registered`);
  }
}

export class NotRegisteredError extends ControllerError {
  constructor(public readonly topic: string) {
    super(`Topic ${topic} not registered`);
  }
}

export class SubscriptionFailedError extends ControllerError {
  constructor(public readonly topic: string, public readonly operation: 'subscribe' | 'unsubscribe', cause?: string) {
    super(`${operation === 'subscribe' ? 'Subscription to' : 'Unsubscription from'} ${topic} failed${cause ? `: ${cause}` : ''}`);
  }
}

export class UnroutedMessageError extends ControllerError {
  constructor(public readonly topic: string) {
    super(`Message from ${topic} received but not registered`);
  }
}

export class ConnectionRefusedError extends ControllerError {
  constructor(public readonly reasonCode: number) {
    super(`Connection failed with code: ${reasonCode}`);
  }
}

export class ConnectTimeoutError extends ControllerError {
  constructor(public readonly timeoutMs: number) {
    super(`Failed to connect within ${timeoutMs} ms`);
  }
}

export class ConfigError extends ControllerError {}
