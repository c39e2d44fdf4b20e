export class ValidationError extends Error {
  public readonly details: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = "ValidationError";
    this.details = details;
  }
}

export class SchemaError extends ValidationError {
  public readonly missing: string[];
  public readonly unknown: string[];

  constructor(message: string, { missing = [], unknown = [] }: { missing?: string[]; unknown?: string[] }) {
    super(message, { missing, unknown });
    this.name = "SchemaError";
    this.missing = missing;
    this.unknown = unknown;
  }
}

export type PersistenceStage = "load" | "replace" | "append";

export class PersistenceError<TResult = unknown> extends Error {
  public readonly stage: PersistenceStage;
  public readonly result?: TResult;

  constructor(stage: PersistenceStage, message: string, options: { cause?: unknown; result?: TResult } = {}) {
    super(message, { cause: options.cause });
    this.name = "PersistenceError";
    this.stage = stage;
    this.result = options.result;
  }
}
