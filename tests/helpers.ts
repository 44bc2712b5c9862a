import fs from "fs/promises";
import os from "os";
import path from "path";
import * as openpgp from "openpgp";
import type { KeyringBackend, KeyringEntry } from "../src/models/keyring.model";

export interface TestKey {
  entry: KeyringEntry;
  privateKey: openpgp.PrivateKey;
  armoredPublicKey: string;
  armoredPrivateKey: string;
}

export async function generateTestKey(
  name: string,
  email: string,
  options: { encryptionSubkey?: boolean } = {},
): Promise<TestKey> {
  const { privateKey, publicKey } = await openpgp.generateKey({
    type: "ecc",
    curve: "curve25519",
    userIDs: [{ name, email }],
    subkeys: options.encryptionSubkey === false ? [] : [{}],
    format: "armored",
  });
  const publicKeyObject = await openpgp.readKey({ armoredKey: publicKey });

  return {
    entry: {
      name,
      email,
      fingerprint: publicKeyObject.getFingerprint().toUpperCase(),
      handle: publicKeyObject.toPublic(),
    },
    privateKey: await openpgp.readPrivateKey({ armoredKey: privateKey }),
    armoredPublicKey: publicKey,
    armoredPrivateKey: privateKey,
  };
}

export async function decryptWithKey(
  ciphertext: Uint8Array,
  key: openpgp.PrivateKey,
): Promise<string> {
  const message = await openpgp.readMessage({ binaryMessage: ciphertext });
  const { data } = await openpgp.decrypt({ message, decryptionKeys: key, format: "binary" });
  return Buffer.from(data).toString("utf-8");
}

export async function decryptWithPassphrase(
  ciphertext: Uint8Array,
  passphrase: string,
): Promise<string> {
  const message = await openpgp.readMessage({ binaryMessage: ciphertext });
  const { data } = await openpgp.decrypt({ message, passwords: [passphrase], format: "binary" });
  return Buffer.from(data).toString("utf-8");
}

export class StaticKeyringBackend implements KeyringBackend {
  calls = 0;

  constructor(public entries: KeyringEntry[] = []) {}

  async listKeys(): Promise<KeyringEntry[]> {
    this.calls += 1;
    return [...this.entries];
  }
}

export function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "transfer-upload-test-"));
}

export async function rejectionOf<E>(
  promise: Promise<unknown>,
  type: abstract new (...args: never[]) => E,
): Promise<E> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof type) return error;
    throw error;
  }
  throw new Error("Expected the promise to reject");
}
