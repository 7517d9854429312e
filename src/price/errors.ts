export type PriceErrorKind =
  | "invalid_symbol"
  | "unsupported_instrument"
  | "no_data"
  | "circuit_open"
  | "transport"
  | "parse"
  | "size_exceeded"
  | "all_failed"
  | "no_holdings"
  | "invalid_price";

export class PriceError extends Error {
  readonly kind: PriceErrorKind;

  constructor(kind: PriceErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** The classifier could not place the symbol in any category. */
export class InvalidSymbolError extends PriceError {
  constructor(readonly symbol: string) {
    super("invalid_symbol", `无法识别标的类型: ${symbol}`);
  }
}

export class UnsupportedInstrumentError extends PriceError {
  constructor(message: string) {
    super("unsupported_instrument", message);
  }
}

export class NoDataError extends PriceError {
  constructor(provider: string) {
    super("no_data", `${provider}: 未获取到数据`);
  }
}

export class CircuitOpenError extends PriceError {
  constructor(provider: string) {
    super("circuit_open", `${provider}: 熔断冷却中`);
  }
}

export class TransportError extends PriceError {
  constructor(message: string, options?: { cause?: unknown; kind?: "transport" | "size_exceeded" }) {
    super(options?.kind ?? "transport", message, options);
  }
}

export class SizeExceededError extends TransportError {
  constructor(readonly limitBytes: number) {
    super(`response body exceeds ${limitBytes} bytes`, { kind: "size_exceeded" });
  }
}

export class ParseError extends PriceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("parse", message, options);
  }
}

/** Every provider in the chain was skipped or failed; `notes` says why for each. */
export class AllProvidersFailedError extends PriceError {
  constructor(message: string, readonly notes: string[]) {
    super("all_failed", message);
  }
}

export class NoHoldingsError extends PriceError {
  constructor(readonly currency: string) {
    super("no_holdings", `currency not found: ${currency}`);
  }
}

export class InvalidPriceError extends PriceError {
  constructor(price: number) {
    super("invalid_price", `invalid price: ${price}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
