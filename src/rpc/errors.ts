/**
 * Failure taxonomy for bridge handlers. Codes stay on the host side (logs);
 * only the message is sent back to the UI.
 */

export const RpcErrorCode = {
  NotFound: "NOT_FOUND",
  Decode: "DECODE_ERROR",
  Io: "IO_ERROR",
  UnknownMethod: "UNKNOWN_METHOD",
  Argument: "ARGUMENT_ERROR",
  ExternalService: "EXTERNAL_SERVICE_ERROR",
} as const;

export type RpcErrorCode = (typeof RpcErrorCode)[keyof typeof RpcErrorCode];

export class RpcError extends Error {
  readonly code: RpcErrorCode;

  constructor(message: string, code: RpcErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RpcError";
    this.code = code;
  }
}

/** Path missing or not canonicalizable. */
export class NotFoundError extends RpcError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, RpcErrorCode.NotFound, options);
    this.name = "NotFoundError";
  }
}

/** Envelope alphabet violation or declared/actual size mismatch. */
export class DecodeError extends RpcError {
  constructor(message: string) {
    super(message, RpcErrorCode.Decode);
    this.name = "DecodeError";
  }
}

export class IoError extends RpcError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, RpcErrorCode.Io, options);
    this.name = "IoError";
  }
}

export class UnknownMethodError extends RpcError {
  readonly method: string;

  constructor(method: string) {
    super(`Wrong RPC method, got: ${method}`, RpcErrorCode.UnknownMethod);
    this.name = "UnknownMethodError";
    this.method = method;
  }
}

export class ArgumentError extends RpcError {
  constructor(message: string) {
    super(message, RpcErrorCode.Argument);
    this.name = "ArgumentError";
  }
}

/** Dialog, update, opener or inspector failure. */
export class ExternalServiceError extends RpcError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, RpcErrorCode.ExternalService, options);
    this.name = "ExternalServiceError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorCode(err: unknown): string {
  return err instanceof RpcError ? err.code : "INTERNAL_ERROR";
}
