export class TransferError<K extends string = string> extends Error {
  readonly kind: K;

  constructor(kind: K, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = "TransferError";
  }
}

export type ConfigurationErrorKind =
  | "InvalidConfiguration"
  | "NoAgentAvailable"
  | "BadTemplate";

export class ConfigurationError extends TransferError<ConfigurationErrorKind> {
  constructor(kind: ConfigurationErrorKind, message: string, options?: { cause?: unknown }) {
    super(kind, message, options);
    this.name = "ConfigurationError";
  }
}

export type AgentErrorKind =
  | "ExecutableNotFound"
  | "NonZeroExit"
  | "Cancelled"
  | "EmptyResponse";

export class AgentError extends TransferError<AgentErrorKind> {
  /** Exit status of the agent process, when it ran to completion. */
  readonly exitCode?: number;
  /** Whatever the agent printed on stdout before failing. */
  readonly output?: string;

  constructor(
    kind: AgentErrorKind,
    message: string,
    details: { exitCode?: number; output?: string; cause?: unknown } = {},
  ) {
    super(kind, message, { cause: details.cause });
    this.name = "AgentError";
    this.exitCode = details.exitCode;
    this.output = details.output;
  }
}

export type KeyringErrorKind = "BackendUnavailable" | "UnknownKey";

export class KeyringError extends TransferError<KeyringErrorKind> {
  constructor(kind: KeyringErrorKind, message: string, options?: { cause?: unknown }) {
    super(kind, message, options);
    this.name = "KeyringError";
  }
}

export type EncryptionErrorKind = "NoPassphrase" | "BackendFailure";

export class EncryptionError extends TransferError<EncryptionErrorKind> {
  constructor(kind: EncryptionErrorKind, message: string, options?: { cause?: unknown }) {
    super(kind, message, options);
    this.name = "EncryptionError";
  }
}

export type IOErrorKind = "SourceUnreadable" | "TempFileWrite";

export class IOError extends TransferError<IOErrorKind> {
  constructor(kind: IOErrorKind, message: string, options?: { cause?: unknown }) {
    super(kind, message, options);
    this.name = "IOError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

export function toTransferError(error: unknown): TransferError {
  if (error instanceof TransferError) {
    return error;
  }
  return new TransferError("Unexpected", errorMessage(error), { cause: error });
}
