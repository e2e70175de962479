/** A chat, ticket-tracker or roster call failed. Never corrupts local state. */
export class AdapterFailureError extends Error {
  readonly adapter: string;
  readonly operation: string;

  constructor(adapter: string, operation: string, detail: string, options?: ErrorOptions) {
    super(`${adapter} ${operation} failed: ${detail}`, options);
    this.name = 'AdapterFailureError';
    this.adapter = adapter;
    this.operation = operation;
  }
}

export class InvalidIntervalError extends Error {
  readonly value: unknown;

  constructor(label: string, value: unknown) {
    super(`${label} must be an integer number of minutes >= 1, got '${String(value)}'.`);
    this.name = 'InvalidIntervalError';
    this.value = value;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
