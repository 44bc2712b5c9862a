#!/usr/bin/env node
import dotenv from "dotenv";
import { createInterface } from "readline/promises";
import { loadConfig } from "./config/config";
import { createTransferService } from "./services/transfer.service";
import type { PassphraseProvider } from "./services/encryption.service";
import {
  EXIT_OK,
  EXIT_USAGE,
  USAGE,
  createSignalHandler,
  parseCommandLine,
  runCommand,
} from "./cli";
import logger from "./utils/logger";

// Load environment variables
dotenv.config();

const promptPassphrase: PassphraseProvider = async () => {
  if (process.env.TRANSFER_PASSPHRASE) {
    return process.env.TRANSFER_PASSPHRASE;
  }
  if (!process.stdin.isTTY) {
    return undefined;
  }
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    return (await rl.question("Passphrase: ")) || undefined;
  } finally {
    rl.close();
  }
};

async function startClient(): Promise<void> {
  const parsed = parseCommandLine(process.argv.slice(2));
  if (!parsed.ok) {
    process.stderr.write(`${parsed.message}\n${USAGE}\n`);
    process.exitCode = EXIT_USAGE;
    return;
  }
  if (parsed.help || !parsed.command) {
    process.stderr.write(`${USAGE}\n`);
    process.exitCode = parsed.help ? EXIT_OK : EXIT_USAGE;
    return;
  }

  const config = loadConfig();
  const transfer = await createTransferService(config, {
    passphraseProvider: promptPassphrase,
  });

  const shutdown = createSignalHandler(transfer, (code) => process.exit(code));
  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);

  process.exitCode = await runCommand(transfer, parsed.command, parsed.targets, parsed.options);
}

startClient().catch((error: unknown) => {
  logger.error("Failed to run transfer-upload:", error);
  process.exit(1);
});
