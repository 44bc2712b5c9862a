import os from "os";
import path from "path";
import Joi from "joi";
import { ConfigurationError } from "../utils/errors";

export interface TransferConfig {
  baseUrl: string;
  tempFileLocation: string;
  remotePrefix: string;
  remoteSuffix: string;
  agentCommand?: string;
  agentArguments?: string[];
  keyReferenceSeparator: string;
  keyringDirectory: string;
  armor: boolean;
}

interface TransferEnv {
  TRANSFER_BASE_URL: string;
  TRANSFER_TEMP_FILE: string;
  TRANSFER_REMOTE_PREFIX: string;
  TRANSFER_REMOTE_SUFFIX: string;
  TRANSFER_AGENT_COMMAND?: string;
  TRANSFER_AGENT_ARGUMENTS?: string;
  TRANSFER_KEY_SEPARATOR: string;
  TRANSFER_KEYRING_DIR: string;
  TRANSFER_ARMOR: boolean;
}

export const DEFAULT_BASE_URL = "https://transfer.sh";
export const DEFAULT_TEMP_FILE = path.join(os.tmpdir(), "transfer-upload.tmp");
export const DEFAULT_KEYRING_DIR = path.join(
  os.homedir(),
  ".config",
  "transfer-upload",
  "keyring",
);

const envSchema = Joi.object<TransferEnv>({
  TRANSFER_BASE_URL: Joi.string()
    .uri({ scheme: ["http", "https"] })
    .default(DEFAULT_BASE_URL),
  TRANSFER_TEMP_FILE: Joi.string().default(DEFAULT_TEMP_FILE),
  TRANSFER_REMOTE_PREFIX: Joi.string().allow("").default(""),
  TRANSFER_REMOTE_SUFFIX: Joi.string().allow("").default(""),
  TRANSFER_AGENT_COMMAND: Joi.string().optional(),
  TRANSFER_AGENT_ARGUMENTS: Joi.string().optional(),
  TRANSFER_KEY_SEPARATOR: Joi.string().default(" - "),
  TRANSFER_KEYRING_DIR: Joi.string().default(DEFAULT_KEYRING_DIR),
  TRANSFER_ARMOR: Joi.boolean().default(false),
}).unknown(true);

const argumentsSchema = Joi.array<string[]>().items(Joi.string()).min(2).required();

const KEEP_EMPTY = new Set(["TRANSFER_REMOTE_PREFIX", "TRANSFER_REMOTE_SUFFIX"]);

function parseAgentArguments(raw: string | undefined): string[] | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(
      "InvalidConfiguration",
      "TRANSFER_AGENT_ARGUMENTS must be a JSON array of strings",
      { cause: error },
    );
  }

  const { error, value } = argumentsSchema.validate(parsed);
  if (error || !value) {
    throw new ConfigurationError(
      "InvalidConfiguration",
      `Invalid TRANSFER_AGENT_ARGUMENTS: ${error ? error.message : "no value"}`,
    );
  }
  return value;
}

/**
 * Builds the client configuration from environment variables. Empty
 * variables count as unset, except the remote prefix and suffix.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): TransferConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(
      ([key, value]) => value !== undefined && (value !== "" || KEEP_EMPTY.has(key)),
    ),
  );

  const { error, value } = envSchema.validate(present);
  if (error || !value) {
    throw new ConfigurationError(
      "InvalidConfiguration",
      `Invalid configuration: ${error ? error.message : "no value"}`,
    );
  }

  return {
    baseUrl: value.TRANSFER_BASE_URL.replace(/\/+$/, ""),
    tempFileLocation: value.TRANSFER_TEMP_FILE,
    remotePrefix: value.TRANSFER_REMOTE_PREFIX,
    remoteSuffix: value.TRANSFER_REMOTE_SUFFIX,
    agentCommand: value.TRANSFER_AGENT_COMMAND,
    agentArguments: parseAgentArguments(value.TRANSFER_AGENT_ARGUMENTS),
    keyReferenceSeparator: value.TRANSFER_KEY_SEPARATOR,
    keyringDirectory: value.TRANSFER_KEYRING_DIR,
    armor: value.TRANSFER_ARMOR,
  };
}
