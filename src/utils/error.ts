export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly is_operational: boolean,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export enum SIM_ERROR {
  INVALID_CAPACITY = "INVALID_CAPACITY",
  TABLE_FULL = "TABLE_FULL",
  INVALID_OPTION = "INVALID_OPTION",
}

export class SimError extends AppError {
  constructor(
    public readonly category: SIM_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, true, context);
  }
}

export function is_sim_error(error: unknown): error is SimError {
  return error instanceof SimError;
}
