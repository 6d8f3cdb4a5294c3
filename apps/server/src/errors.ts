/**
 * Rejected at the message layer (bad wire encoding). The session is unaffected.
 */
export class MalformedInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedInputError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * `AbortSignal.timeout` rejects with a DOMException named TimeoutError.
 */
export function isTimeoutError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "name" in err && err.name === "TimeoutError";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
