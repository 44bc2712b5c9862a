import { parseArgs } from "util";
import type { TransferService } from "./services/transfer.service";
import type { UploadHandle, UploadOptions, UploadResult } from "./models/upload.model";
import { errorMessage } from "./utils/errors";
import logger from "./utils/logger";

export const USAGE = `Usage:
  transfer-upload upload <file> [--name <remote>] [--async]
  transfer-upload upload-stdin [--name <remote>] [--async]
  transfer-upload encrypt-upload <file|-> [--recipient <key>]... [--name <remote>] [--async]
  transfer-upload keys`;

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const SIGNAL_EXIT_CODES: Record<string, number> = {
  SIGINT: 130,
  SIGTERM: 143,
};

export interface CommandOptions extends UploadOptions {
  recipients: string[];
}

export type ParsedCommandLine =
  | {
      ok: true;
      command: string | undefined;
      targets: string[];
      help: boolean;
      options: CommandOptions;
    }
  | { ok: false; message: string };

export interface CommandIO {
  stdout(text: string): void;
  stderr(text: string): void;
  readStdin(): Promise<Buffer>;
}

async function readProcessStdin(): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

export const processIO: CommandIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  readStdin: readProcessStdin,
};

export function parseCommandLine(args: string[]): ParsedCommandLine {
  try {
    const { values, positionals } = parseArgs({
      args,
      allowPositionals: true,
      options: {
        name: { type: "string" },
        recipient: { type: "string", multiple: true },
        async: { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
    });

    const [command, ...targets] = positionals;
    return {
      ok: true,
      command,
      targets,
      help: values.help === true,
      options: {
        remoteFileName: values.name,
        async: values.async === true,
        recipients: values.recipient ?? [],
      },
    };
  } catch (error) {
    return { ok: false, message: errorMessage(error) };
  }
}

async function settle(outcome: Promise<UploadResult> | UploadHandle): Promise<UploadResult> {
  if (outcome instanceof Promise) {
    return outcome;
  }
  logger.info(`Upload ${outcome.jobId} running in background`);
  return outcome.result;
}

/** Prints the URL alone on stdout; failures are already logged by the pipeline. */
export function report(result: UploadResult, io: CommandIO = processIO): number {
  if (!result.ok) {
    return EXIT_FAILURE;
  }
  io.stdout(`${result.url}\n`);
  return EXIT_OK;
}

export async function runCommand(
  transfer: TransferService,
  command: string | undefined,
  targets: string[],
  options: CommandOptions,
  io: CommandIO = processIO,
): Promise<number> {
  const { recipients, ...uploadOptions } = options;
  const background = uploadOptions.async === true;

  switch (command) {
    case "upload": {
      const [file] = targets;
      if (!file) break;
      return report(
        await settle(
          background
            ? transfer.uploadFile(file, { ...uploadOptions, async: true })
            : transfer.uploadFile(file, { ...uploadOptions, async: false }),
        ),
        io,
      );
    }
    case "upload-stdin": {
      const bytes = await io.readStdin();
      return report(
        await settle(
          background
            ? transfer.uploadRegionOrBuffer(bytes, { ...uploadOptions, async: true })
            : transfer.uploadRegionOrBuffer(bytes, { ...uploadOptions, async: false }),
        ),
        io,
      );
    }
    case "encrypt-upload": {
      const [file] = targets;
      if (!file) break;
      const content = file === "-" ? await io.readStdin() : file;
      return report(
        await settle(
          background
            ? transfer.encryptAndUpload(content, recipients, { ...uploadOptions, async: true })
            : transfer.encryptAndUpload(content, recipients, { ...uploadOptions, async: false }),
        ),
        io,
      );
    }
    case "keys": {
      await transfer.refreshKeyring();
      for (const reference of await transfer.listKeyReferences()) {
        io.stdout(`${reference}\n`);
      }
      return EXIT_OK;
    }
  }

  io.stderr(`${USAGE}\n`);
  return EXIT_USAGE;
}

/**
 * The first signal cancels running uploads and lets them report. With
 * nothing to cancel, or on a second signal, the process exits.
 */
export function createSignalHandler(
  transfer: Pick<TransferService, "activeJobCount" | "cancelAll">,
  exit: (code: number) => void,
): (signal: NodeJS.Signals) => void {
  let interrupted = false;

  return (signal) => {
    if (interrupted || transfer.activeJobCount === 0) {
      logger.info(`${signal} received, exiting`);
      exit(SIGNAL_EXIT_CODES[signal] ?? EXIT_FAILURE);
      return;
    }
    interrupted = true;
    logger.info(`${signal} received, cancelling uploads...`);
    transfer.cancelAll();
  };
}
