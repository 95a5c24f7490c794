// Error taxonomy. Every failure the engine raises on purpose is a SimulationError.

export type SimulationErrorCode =
  | 'CONFIGURATION'
  | 'NUMERICAL'
  | 'INVALID_PARAMETER'
  | 'ALL_REPETITIONS_FAILED'
  | 'KEY_NOT_FOUND'
  | 'INCONSISTENT_SERIES';

export class SimulationError extends Error {
  readonly code: SimulationErrorCode;

  constructor(code: SimulationErrorCode, message: string, options?: { cause?: unknown }) {
    super(`[TokenSim] ${message}`, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Bad wiring: missing price function, schedule length mismatch, unknown controller style. */
export class ConfigurationError extends SimulationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION', message, options);
  }
}

/** A computed price or supply was NaN or infinite. Fatal to the current repetition only. */
export class NumericalError extends SimulationError {
  readonly variable: string;
  readonly step: number;
  readonly value: number;

  constructor(variable: string, step: number, value: number) {
    super('NUMERICAL', `${variable} became ${String(value)} at step ${step}`);
    this.variable = variable;
    this.step = step;
    this.value = value;
  }
}

export class InvalidParameterError extends SimulationError {
  readonly parameter: string;

  constructor(parameter: string, message: string) {
    super('INVALID_PARAMETER', message);
    this.parameter = parameter;
  }
}

export class AllRepetitionsFailedError extends SimulationError {
  readonly scenario: string;
  readonly failures: number;
  readonly repetitions: number;

  constructor(scenario: string, failures: number, repetitions: number, options?: { cause?: unknown }) {
    super(
      'ALL_REPETITIONS_FAILED',
      `All ${repetitions} repetitions of scenario "${scenario}" failed (${failures} numerical failures)`,
      options,
    );
    this.scenario = scenario;
    this.failures = failures;
    this.repetitions = repetitions;
  }
}

export class KeyNotFoundError extends SimulationError {
  readonly key: string;

  constructor(key: string, message?: string) {
    super('KEY_NOT_FOUND', message ?? `Variable "${key}" was never produced`);
    this.key = key;
  }
}

/** A repetition produced series of the wrong length or with a different variable set. */
export class InconsistentSeriesError extends SimulationError {
  constructor(message: string) {
    super('INCONSISTENT_SERIES', message);
  }
}

export function isSimulationError(err: unknown): err is SimulationError {
  return err instanceof SimulationError;
}
