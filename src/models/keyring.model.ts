import type { PublicKey } from "openpgp";

export interface KeyringEntry {
  name: string;
  email: string;
  fingerprint: string;
  handle: PublicKey;
}

export interface KeyRecord extends KeyringEntry {
  /** Display label: name, email and fingerprint joined by the separator. */
  reference: string;
}

export interface KeyringBackend {
  listKeys(): Promise<KeyringEntry[]>;
}
