/**
 * Contract violations raised by the simulator.
 * All are thrown synchronously and never retried.
 */

export type PriceSimErrorCode = "INVALID_CONFIGURATION" | "INVALID_STATE" | "OUT_OF_RANGE";

export class PriceSimError extends Error {
  constructor(
    readonly code: PriceSimErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidConfigurationError extends PriceSimError {
  constructor(readonly violations: string[]) {
    super("INVALID_CONFIGURATION", `Invalid simulation config: ${violations.join("; ")}`);
  }
}

export class InvalidStateError extends PriceSimError {
  constructor(message: string) {
    super("INVALID_STATE", message);
  }
}

export class OutOfRangeError extends PriceSimError {
  constructor(
    readonly index: number,
    readonly min: number,
    readonly max: number
  ) {
    super("OUT_OF_RANGE", `Index ${index} out of range [${min}, ${max}]`);
  }
}
