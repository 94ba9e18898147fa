export type PipelineStage = "classify" | "extract" | "embed" | "route" | "store";

export interface AppErrorOptions {
  message: string;
  code: string;
  stage?: PipelineStage;
  isOperational?: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class AppError extends Error {
  public readonly code: string;
  public readonly stage?: PipelineStage;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor({ message, code, stage, isOperational = true, details, cause }: AppErrorOptions) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;
    this.stage = stage;
    this.isOperational = isOperational;
    this.details = details;

    // Restore prototype chain (necessary when extending built-ins in TS)
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  static isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
  }
}
