// ─── Error kinds ────────────────────────────────────────────────────

export class MonitorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A required constructor argument is missing or malformed */
export class InvalidArgument extends MonitorError {}

/** A duration literal does not match `(\d+[smhdw])+` or `INF` */
export class InvalidDuration extends MonitorError {}

/** Query options that cannot be combined */
export class InvalidCombination extends MonitorError {}

export class MultipleDefaultPolicies extends MonitorError {}

export class UnrecognizedUnit extends MonitorError {}

export class NotNumeric extends MonitorError {}

export class EmptyInput extends MonitorError {}

export class NoFieldsToInsert extends MonitorError {}

export class UnsupportedTimestampType extends MonitorError {}

/** Non-2xx response, or an `error` entry inside a 200 query response */
export class InfluxHttpError extends MonitorError {
  readonly status: number;
  readonly body: string;

  constructor(message: string, status: number, body: string) {
    super(message);
    this.status = status;
    this.body = body;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

// ─── ErrorLog ───────────────────────────────────────────────────────

/**
 * Collects every recoverable error of a run so it can be reported (and
 * stored) at the end instead of aborting data collection.
 */
export class ErrorLog {
  private entries: string[] = [];

  record(message: string): void {
    console.error(`[error] ${message}`);
    this.entries.push(message);
  }

  recordError(err: unknown, context?: string): void {
    const name = err instanceof Error ? err.name : "Error";
    this.record(`${name}: ${errorMessage(err)}`);
    if (context) this.record(context);
  }

  get count(): number {
    return this.entries.length;
  }

  get messages(): readonly string[] {
    return this.entries;
  }

  summary(): string {
    if (this.entries.length === 0) return "no errors";
    return `total of ${this.entries.length} error(s) occurred`;
  }
}
