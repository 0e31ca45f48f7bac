export type TradestatErrorCode = "invalid-input" | "table-not-found";

export class TradestatError extends Error {
  constructor(
    readonly code: TradestatErrorCode,
    message: string,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed or insufficient input. Aborts the requested computation. */
export class InvalidInputError extends TradestatError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("invalid-input", message, details);
  }
}

export class TableNotFoundError extends TradestatError {
  constructor(readonly table: string) {
    super("table-not-found", `Trade table not found: ${table}`, { table });
  }
}
