import fs from "fs/promises";
import * as openpgp from "openpgp";
import logger from "../utils/logger";
import { writeTempFile } from "../utils/tempfile";
import {
  EncryptionError,
  IOError,
  KeyringError,
  errorMessage,
} from "../utils/errors";
import type { KeyRecord } from "../models/keyring.model";
import type { KeyringService } from "./keyring.service";

/** Asks the user for a symmetric passphrase; resolves undefined when declined. */
export type PassphraseProvider = () => Promise<string | undefined>;

export interface EncryptionOptions {
  /** ASCII-armored output instead of binary OpenPGP packets. */
  armor: boolean;
}

export class EncryptionService {
  constructor(
    private readonly keyring: KeyringService,
    private readonly passphraseProvider: PassphraseProvider,
    private readonly options: EncryptionOptions = { armor: false },
  ) {}

  get fileExtension(): string {
    return this.options.armor ? ".asc" : ".gpg";
  }

  /**
   * Maps references to keys, building the keyring on first use. An unknown
   * reference rejects the whole selection.
   */
  async resolveRecipients(references: readonly string[]): Promise<KeyRecord[]> {
    if (references.length === 0) return [];

    await this.keyring.ensureLoaded();

    const keys: KeyRecord[] = [];
    for (const reference of references) {
      const record = this.keyring.lookup(reference);
      if (!record) {
        throw new KeyringError("UnknownKey", `No key matches "${reference}"`);
      }
      if (!keys.some((key) => key.fingerprint === record.fingerprint)) {
        keys.push(record);
      }
    }
    return keys;
  }

  /**
   * Encrypts to exactly `keys`, or with a passphrase when `keys` is empty.
   */
  async encrypt(plaintext: Uint8Array, keys: readonly KeyRecord[]): Promise<Uint8Array> {
    const recipients = keys.map((key) => key.handle);
    const passwords = recipients.length === 0 ? [await this.obtainPassphrase()] : undefined;

    let ciphertext: Uint8Array;
    try {
      const message = await openpgp.createMessage({ binary: plaintext });
      const encryptionKeys = recipients.length > 0 ? recipients : undefined;

      if (this.options.armor) {
        const armored = await openpgp.encrypt({
          message,
          encryptionKeys,
          passwords,
          format: "armored",
        });
        ciphertext = Buffer.from(armored, "utf-8");
      } else {
        ciphertext = await openpgp.encrypt({
          message,
          encryptionKeys,
          passwords,
          format: "binary",
        });
      }
    } catch (error) {
      logger.error("OpenPGP encryption failed:", error);
      throw new EncryptionError("BackendFailure", `Encryption failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    logger.debug(
      recipients.length > 0
        ? `Encrypted ${plaintext.length} bytes for ${keys.map((key) => key.fingerprint).join(", ")}`
        : `Encrypted ${plaintext.length} bytes with passphrase`,
    );
    return ciphertext;
  }

  async encryptFile(
    sourcePath: string,
    targetPath: string,
    keys: readonly KeyRecord[],
  ): Promise<string> {
    let plaintext: Buffer;
    try {
      plaintext = await fs.readFile(sourcePath);
    } catch (error) {
      throw new IOError(
        "SourceUnreadable",
        `Cannot read ${sourcePath}: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    const ciphertext = await this.encrypt(plaintext, keys);
    return writeTempFile(targetPath, ciphertext);
  }

  private async obtainPassphrase(): Promise<string> {
    let passphrase: string | undefined;
    try {
      passphrase = await this.passphraseProvider();
    } catch (error) {
      throw new EncryptionError("NoPassphrase", `No passphrase supplied: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!passphrase) {
      throw new EncryptionError("NoPassphrase", "No passphrase supplied for symmetric encryption");
    }
    return passphrase;
  }
}
