export type LaunchErrorCode = "INVALID_PORT" | "PORT_IN_USE" | "LISTEN_FAILED";

export interface LaunchConfig {
  host: string;
  // Raw value from the environment; the server validates it.
  port: string;
}

export interface ErrorBody {
  errorCode: string;
  errorMessage: string;
}

export class LaunchError extends Error {
  readonly errorCode: LaunchErrorCode;

  constructor(errorCode: LaunchErrorCode, message: string) {
    super(`${errorCode}: ${message}`);
    this.name = "LaunchError";
    this.errorCode = errorCode;
  }
}
