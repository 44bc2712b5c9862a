import type { TransferError } from "../utils/errors";

export const SOURCE_SLOT = "{source}";
export const DESTINATION_SLOT = "{destination}";

export type AgentVariant =
  | { kind: "put" }
  | { kind: "upload-file" }
  | { kind: "custom"; template: readonly string[] };

export interface ResolvedAgent {
  variant: AgentVariant;
  /** Absolute path of the located executable. */
  command: string;
  template: readonly string[];
}

export type UploadSource =
  | { kind: "file"; path: string }
  | { kind: "buffer"; data: Uint8Array };

export interface EncryptionRequest {
  /** Key references or fingerprints; empty means passphrase mode. */
  recipients: readonly string[];
}

export interface UploadJob {
  id: string;
  source: UploadSource;
  remoteFileName: string;
  async: boolean;
  encryption?: EncryptionRequest;
}

export type UploadJobState =
  | "resolving"
  | "encrypting"
  | "uploading"
  | "completed"
  | "failed";

export type UploadResult =
  | {
      ok: true;
      jobId: string;
      remoteFileName: string;
      url: string;
      exitCode: 0;
    }
  | {
      ok: false;
      jobId: string;
      remoteFileName: string;
      error: TransferError;
      exitCode?: number;
      output?: string;
    };

export interface UploadHandle {
  jobId: string;
  result: Promise<UploadResult>;
  readonly state: UploadJobState;
  cancel(): void;
}

export interface UploadOptions {
  /** Remote name before prefix/suffix; defaults to the source's base name. */
  remoteFileName?: string;
  /** Name used for buffers when no remote name is given. */
  sourceName?: string;
  async?: boolean;
}

export interface Notification {
  level: "info" | "error";
  message: string;
}
