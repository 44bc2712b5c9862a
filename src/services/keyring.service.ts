import fs from "fs/promises";
import path from "path";
import * as openpgp from "openpgp";
import logger from "../utils/logger";
import { KeyringError, errorMessage } from "../utils/errors";
import type { KeyRecord, KeyringBackend, KeyringEntry } from "../models/keyring.model";

const KEY_FILE_EXTENSIONS = new Set([".asc", ".gpg", ".pgp", ".key", ".pub"]);
const ARMOR_HEADER = "-----BEGIN PGP";

export function parseUserId(userId: string): { name: string; email: string } {
  const match = /^(.*?)\s*<([^>]*)>\s*$/.exec(userId);
  if (!match) {
    return { name: userId.trim(), email: "" };
  }
  return { name: match[1].trim(), email: match[2].trim() };
}

/**
 * Reads OpenPGP keys from every key file in a directory. Private keys are
 * exposed by their public half only.
 */
export class OpenPgpKeyringBackend implements KeyringBackend {
  constructor(private readonly directory: string) {}

  async listKeys(): Promise<KeyringEntry[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.directory);
    } catch (error) {
      throw new KeyringError(
        "BackendUnavailable",
        `Cannot open keyring at ${this.directory}: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    const entries: KeyringEntry[] = [];
    for (const file of files.sort()) {
      if (!KEY_FILE_EXTENSIONS.has(path.extname(file).toLowerCase())) continue;

      const filePath = path.join(this.directory, file);
      try {
        const keys = await this.readKeyFile(filePath);
        for (const key of keys) {
          const { name, email } = parseUserId(key.getUserIDs()[0] ?? "");
          entries.push({
            name,
            email,
            fingerprint: key.getFingerprint().toUpperCase(),
            handle: key.toPublic(),
          });
        }
      } catch (error) {
        logger.warn(`Skipping unreadable key file ${filePath}: ${errorMessage(error)}`);
      }
    }
    return entries;
  }

  private async readKeyFile(filePath: string): Promise<openpgp.Key[]> {
    const data = await fs.readFile(filePath);
    if (data.subarray(0, 64).toString("utf-8").includes(ARMOR_HEADER)) {
      return openpgp.readKeys({ armoredKeys: data.toString("utf-8") });
    }
    return openpgp.readKeys({ binaryKeys: new Uint8Array(data) });
  }
}

export class KeyringService {
  private readonly records = new Map<string, KeyRecord>();
  private readonly references = new Map<string, string>();
  private loaded = false;
  private pending: Promise<void> | null = null;
  private queued: Promise<void> | null = null;

  constructor(
    private readonly backend: KeyringBackend,
    private readonly separator: string = " - ",
  ) {}

  get isLoaded(): boolean {
    return this.loaded;
  }

  get size(): number {
    return this.records.size;
  }

  referenceFor(entry: KeyringEntry): string {
    return [entry.name, entry.email, entry.fingerprint].join(this.separator);
  }

  /**
   * Discards the cache and re-enumerates the backend. A refresh requested
   * while a rebuild is running starts a new one once that finishes, and
   * requests arriving in the meantime share it.
   */
  refresh(): Promise<void> {
    if (!this.pending) {
      return this.startRebuild();
    }
    if (!this.queued) {
      // The running rebuild reports its own failure to its callers.
      this.queued = this.pending
        .catch(() => undefined)
        .then(() => {
          this.queued = null;
          return this.startRebuild();
        });
    }
    return this.queued;
  }

  async ensureLoaded(): Promise<void> {
    if (this.loaded) return;
    await (this.pending ?? this.startRebuild());
  }

  /** Accepts either a reference string or a bare fingerprint. */
  lookup(reference: string): KeyRecord | undefined {
    const fingerprint = this.references.get(reference) ?? reference.replace(/\s+/g, "").toUpperCase();
    return this.records.get(fingerprint);
  }

  allReferences(): string[] {
    return [...this.references.keys()];
  }

  private startRebuild(): Promise<void> {
    const rebuild = this.rebuild().finally(() => {
      this.pending = null;
    });
    this.pending = rebuild;
    return rebuild;
  }

  private async rebuild(): Promise<void> {
    let entries: KeyringEntry[];
    try {
      entries = await this.backend.listKeys();
    } catch (error) {
      if (error instanceof KeyringError) throw error;
      throw new KeyringError(
        "BackendUnavailable",
        `Keyring backend failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    this.records.clear();
    this.references.clear();

    for (const entry of entries) {
      const fingerprint = entry.fingerprint.toUpperCase();
      if (this.records.has(fingerprint)) {
        logger.warn(`Duplicate key ${fingerprint} in keyring, keeping the first one`);
        continue;
      }
      const normalized: KeyringEntry = { ...entry, fingerprint };
      const record: KeyRecord = { ...normalized, reference: this.referenceFor(normalized) };
      this.records.set(fingerprint, record);
      this.references.set(record.reference, fingerprint);
    }

    this.loaded = true;
    logger.debug(`Keyring index rebuilt with ${this.records.size} keys`);
  }
}
