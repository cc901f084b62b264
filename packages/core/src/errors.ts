export type BridgeErrorCode =
  | "MissingParameter"
  | "TypeMismatch"
  | "InvalidArity"
  | "InvalidName"
  | "InvalidPath"
  | "NotFound"
  | "AlreadyExists"
  | "DirectoryCreateFailed"
  | "WriteFailed"
  | "DecodeFailed"
  | "UnsupportedSlot"
  | "UnknownTemplate"
  | "UnknownCommand"
  | "Unknown";

export class BridgeError extends Error {
  readonly code: BridgeErrorCode;
  readonly detail?: string;

  constructor(code: BridgeErrorCode, message: string, detail?: string) {
    super(message);
    this.name = "BridgeError";
    this.code = code;
    this.detail = detail;
  }
}

export function isBridgeError(error: unknown): error is BridgeError {
  return error instanceof BridgeError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function asBridgeError(error: unknown, fallbackCode: BridgeErrorCode, fallbackMessage: string): BridgeError {
  if (isBridgeError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new BridgeError(fallbackCode, error.message, error.stack);
  }
  return new BridgeError(fallbackCode, fallbackMessage, String(error));
}
