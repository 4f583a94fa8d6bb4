/**
 * Relay Error Classes
 */

export class RelayError extends Error {
  constructor(
    message: string,
    public code: string,
    public recoverable: boolean = true,
  ) {
    super(message);
    this.name = 'RelayError';
  }
}

export class TaskCancelledError extends RelayError {
  constructor(public taskKey: string) {
    super(`Task ${taskKey} was cancelled`, 'TASK_CANCELLED', true);
    this.name = 'TaskCancelledError';
  }
}

export class InvalidTransitionError extends RelayError {
  constructor(
    public taskKey: string,
    public from: string,
    public to: string,
  ) {
    super(`Invalid task transition for ${taskKey}: ${from} -> ${to}`, 'INVALID_TRANSITION', true);
    this.name = 'InvalidTransitionError';
  }
}

export class InterventionTimeoutError extends RelayError {
  constructor(
    public interventionId: string,
    public timeoutMs: number,
  ) {
    super(`Intervention ${interventionId} timed out after ${timeoutMs}ms`, 'INTERVENTION_TIMEOUT', true);
    this.name = 'InterventionTimeoutError';
  }
}

export class ConnectionLostError extends RelayError {
  constructor(message = 'No websocket connection available') {
    super(message, 'CONNECTION_LOST', true);
    this.name = 'ConnectionLostError';
  }
}

export class PortBindExhaustedError extends RelayError {
  constructor(
    public port: number,
    public attempts: number,
    public lastError?: string,
  ) {
    super(
      `Could not bind port ${port} after ${attempts} attempts${lastError ? `: ${lastError}` : ''}`,
      'PORT_BIND_EXHAUSTED',
      false,
    );
    this.name = 'PortBindExhaustedError';
  }
}

export class ConfigError extends RelayError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR', false);
    this.name = 'ConfigError';
  }
}

export class DriverLoadError extends RelayError {
  constructor(
    message: string,
    public driver: string,
  ) {
    super(message, 'DRIVER_LOAD_ERROR', false);
    this.name = 'DriverLoadError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
