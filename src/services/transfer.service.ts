import path from "path";
import { v4 as uuidv4 } from "uuid";
import logger from "../utils/logger";
import { remoteFileName } from "../utils/sanitizer";
import type { ExecutableProbe } from "../utils/executable";
import type { TransferConfig } from "../config/config";
import type { KeyringBackend } from "../models/keyring.model";
import type {
  UploadHandle,
  UploadJob,
  UploadOptions,
  UploadResult,
  UploadSource,
} from "../models/upload.model";
import { AgentService, resolveAgent, type TransferAgent } from "./agent.service";
import { KeyringService, OpenPgpKeyringBackend } from "./keyring.service";
import { EncryptionService, type PassphraseProvider } from "./encryption.service";
import { ResultService, type Notifier } from "./result.service";
import { UploaderService } from "./uploader.service";

type SyncOptions = UploadOptions & { async?: false };
type AsyncOptions = UploadOptions & { async: true };

export interface NamingOptions {
  remotePrefix: string;
  remoteSuffix: string;
  tempFileLocation: string;
}

export class TransferService {
  constructor(
    private readonly uploader: UploaderService,
    private readonly keyring: KeyringService,
    private readonly results: ResultService,
    private readonly naming: NamingOptions,
  ) {}

  get lastUrl(): string | null {
    return this.results.getLastUrl();
  }

  get activeJobCount(): number {
    return this.uploader.activeJobCount;
  }

  uploadFile(localPath: string, options?: SyncOptions): Promise<UploadResult>;
  uploadFile(localPath: string, options: AsyncOptions): UploadHandle;
  uploadFile(
    localPath: string,
    options: UploadOptions = {},
  ): Promise<UploadResult> | UploadHandle {
    return this.submit({ kind: "file", path: localPath }, path.basename(localPath), options);
  }

  uploadRegionOrBuffer(bytes: Uint8Array, options?: SyncOptions): Promise<UploadResult>;
  uploadRegionOrBuffer(bytes: Uint8Array, options: AsyncOptions): UploadHandle;
  uploadRegionOrBuffer(
    bytes: Uint8Array,
    options: UploadOptions = {},
  ): Promise<UploadResult> | UploadHandle {
    return this.submit({ kind: "buffer", data: bytes }, this.bufferName(options), options);
  }

  encryptAndUpload(
    content: Uint8Array | string,
    recipientReferences: readonly string[],
    options?: SyncOptions,
  ): Promise<UploadResult>;
  encryptAndUpload(
    content: Uint8Array | string,
    recipientReferences: readonly string[],
    options: AsyncOptions,
  ): UploadHandle;
  encryptAndUpload(
    content: Uint8Array | string,
    recipientReferences: readonly string[],
    options: UploadOptions = {},
  ): Promise<UploadResult> | UploadHandle {
    const source: UploadSource =
      typeof content === "string"
        ? { kind: "file", path: content }
        : { kind: "buffer", data: content };
    const defaultName =
      typeof content === "string" ? path.basename(content) : this.bufferName(options);

    return this.submit(source, defaultName, options, {
      recipients: [...recipientReferences],
    });
  }

  async refreshKeyring(): Promise<void> {
    await this.keyring.refresh();
    logger.info(`Keyring refreshed: ${this.keyring.size} keys`);
  }

  async listKeyReferences(): Promise<string[]> {
    await this.keyring.ensureLoaded();
    return this.keyring.allReferences();
  }

  cancelAll(): void {
    this.uploader.cancelAll();
  }

  private bufferName(options: UploadOptions): string {
    return options.sourceName ?? path.basename(this.naming.tempFileLocation);
  }

  private submit(
    source: UploadSource,
    defaultName: string,
    options: UploadOptions,
    encryption?: UploadJob["encryption"],
  ): Promise<UploadResult> | UploadHandle {
    const job: UploadJob = {
      id: uuidv4(),
      source,
      remoteFileName: remoteFileName(
        options.remoteFileName ?? defaultName,
        this.naming.remotePrefix,
        this.naming.remoteSuffix,
      ),
      async: options.async ?? false,
      encryption,
    };

    return job.async ? this.uploader.uploadAsync(job) : this.uploader.upload(job);
  }
}

export interface TransferOverrides {
  passphraseProvider?: PassphraseProvider;
  notifier?: Notifier;
  keyringBackend?: KeyringBackend;
  probe?: ExecutableProbe;
  /** Skips agent resolution entirely. */
  agent?: TransferAgent;
}

const noPassphrase: PassphraseProvider = async () => undefined;

/**
 * Wires every component from configuration. The upload agent is resolved
 * here, so a missing executable fails before any job is accepted.
 */
export async function createTransferService(
  config: TransferConfig,
  overrides: TransferOverrides = {},
): Promise<TransferService> {
  const agent =
    overrides.agent ??
    new AgentService(
      await resolveAgent(
        { agentCommand: config.agentCommand, agentArguments: config.agentArguments },
        overrides.probe,
      ),
    );

  const keyring = new KeyringService(
    overrides.keyringBackend ?? new OpenPgpKeyringBackend(config.keyringDirectory),
    config.keyReferenceSeparator,
  );
  const encryption = new EncryptionService(
    keyring,
    overrides.passphraseProvider ?? noPassphrase,
    { armor: config.armor },
  );
  const results = new ResultService(overrides.notifier);
  const uploader = new UploaderService(agent, encryption, results, {
    baseUrl: config.baseUrl,
    tempFileLocation: config.tempFileLocation,
  });

  return new TransferService(uploader, keyring, results, {
    remotePrefix: config.remotePrefix,
    remoteSuffix: config.remoteSuffix,
    tempFileLocation: config.tempFileLocation,
  });
}
