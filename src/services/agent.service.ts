import path from "path";
import { spawn } from "child_process";
import logger from "../utils/logger";
import { AgentError, ConfigurationError } from "../utils/errors";
import { findExecutable, type ExecutableProbe } from "../utils/executable";
import {
  DESTINATION_SLOT,
  SOURCE_SLOT,
  type AgentVariant,
  type ResolvedAgent,
} from "../models/upload.model";

export const PUT_TEMPLATE: readonly string[] = [
  "--method",
  "PUT",
  "--output-document",
  "-",
  "--body-file",
  SOURCE_SLOT,
  DESTINATION_SLOT,
];

export const UPLOAD_FILE_TEMPLATE: readonly string[] = [
  "--upload-file",
  SOURCE_SLOT,
  DESTINATION_SLOT,
];

// Probed in this order when nothing is configured
const BUILT_IN_AGENTS: ReadonlyArray<{ command: string; variant: AgentVariant }> = [
  { command: "wget", variant: { kind: "put" } },
  { command: "curl", variant: { kind: "upload-file" } },
];

export interface AgentOptions {
  agentCommand?: string;
  agentArguments?: readonly string[];
}

/** Anything able to move a local file to a URL and hand back the response body. */
export interface TransferAgent {
  invoke(localPath: string, remoteUrl: string, signal?: AbortSignal): Promise<string>;
}

export function templateFor(variant: AgentVariant): readonly string[] {
  switch (variant.kind) {
    case "put":
      return PUT_TEMPLATE;
    case "upload-file":
      return UPLOAD_FILE_TEMPLATE;
    case "custom":
      return variant.template;
  }
}

export function validateTemplate(template: readonly string[]): void {
  const sources = template.filter((token) => token === SOURCE_SLOT).length;
  const destinations = template.filter((token) => token === DESTINATION_SLOT).length;

  if (sources !== 1 || destinations !== 1) {
    throw new ConfigurationError(
      "BadTemplate",
      `Agent argument template needs exactly one ${SOURCE_SLOT} and one ${DESTINATION_SLOT} (found ${sources} and ${destinations})`,
    );
  }
}

export function buildArguments(
  template: readonly string[],
  localPath: string,
  remoteUrl: string,
): string[] {
  return template.map((token) => {
    if (token === SOURCE_SLOT) return localPath;
    if (token === DESTINATION_SLOT) return remoteUrl;
    return token;
  });
}

function builtInVariantFor(command: string): AgentVariant | undefined {
  const base = path.basename(command).replace(/\.exe$/i, "");
  return BUILT_IN_AGENTS.find((agent) => agent.command === base)?.variant;
}

/**
 * Picks the agent once. An explicit command always wins over PATH probing;
 * its template is taken from configuration or, for wget/curl, from the
 * matching built-in variant.
 */
export async function resolveAgent(
  options: AgentOptions,
  probe: ExecutableProbe = (name) => findExecutable(name),
): Promise<ResolvedAgent> {
  if (options.agentCommand) {
    let variant: AgentVariant | undefined;
    if (options.agentArguments) {
      variant = { kind: "custom", template: [...options.agentArguments] };
    } else {
      variant = builtInVariantFor(options.agentCommand);
    }

    if (!variant) {
      throw new ConfigurationError(
        "BadTemplate",
        `No argument template configured for agent command "${options.agentCommand}"`,
      );
    }

    const template = templateFor(variant);
    validateTemplate(template);

    const command = await probe(options.agentCommand);
    if (!command) {
      throw new AgentError(
        "ExecutableNotFound",
        `Configured upload agent "${options.agentCommand}" was not found`,
      );
    }

    logger.debug(`Using configured upload agent ${command}`, { variant: variant.kind });
    return { variant, command, template };
  }

  for (const agent of BUILT_IN_AGENTS) {
    const command = await probe(agent.command);
    if (command) {
      const template = options.agentArguments
        ? [...options.agentArguments]
        : templateFor(agent.variant);
      validateTemplate(template);
      const variant: AgentVariant = options.agentArguments
        ? { kind: "custom", template }
        : agent.variant;
      logger.debug(`Detected upload agent ${command}`, { variant: variant.kind });
      return { variant, command, template };
    }
  }

  throw new ConfigurationError(
    "NoAgentAvailable",
    `No upload agent found on PATH (looked for ${BUILT_IN_AGENTS.map((a) => a.command).join(", ")})`,
  );
}

export class AgentService implements TransferAgent {
  private readonly agent: ResolvedAgent;

  constructor(agent: ResolvedAgent) {
    validateTemplate(agent.template);
    this.agent = agent;
  }

  get command(): string {
    return this.agent.command;
  }

  get variant(): AgentVariant {
    return this.agent.variant;
  }

  argumentsFor(localPath: string, remoteUrl: string): string[] {
    return buildArguments(this.agent.template, localPath, remoteUrl);
  }

  invoke(localPath: string, remoteUrl: string, signal?: AbortSignal): Promise<string> {
    const args = this.argumentsFor(localPath, remoteUrl);

    if (signal?.aborted) {
      return Promise.reject(new AgentError("Cancelled", "Upload cancelled before the agent started"));
    }

    logger.debug(`Running upload agent ${this.agent.command}`, { args });

    return new Promise<string>((resolve, reject) => {
      const child = spawn(this.agent.command, args, {
        stdio: ["ignore", "pipe", "pipe"],
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let settled = false;
      // undefined while the agent is still running
      let exitStatus: number | null | undefined;

      const settle = (error: AgentError | null, output?: string): void => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener("abort", onAbort);
        if (error) {
          reject(error);
        } else {
          resolve(output ?? "");
        }
      };

      const onAbort = (): void => {
        if (exitStatus === undefined) {
          child.kill("SIGTERM");
        }
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

      child.on("error", (error: NodeJS.ErrnoException) => {
        if (error.code === "ENOENT") {
          settle(
            new AgentError("ExecutableNotFound", `Upload agent ${this.agent.command} not found`, {
              cause: error,
            }),
          );
          return;
        }
        settle(
          new AgentError("NonZeroExit", `Upload agent failed to start: ${error.message}`, {
            cause: error,
          }),
        );
      });

      // A killed agent may leave children holding the pipes open, so a
      // cancelled run settles on exit rather than waiting for close.
      child.on("exit", (code: number | null) => {
        exitStatus = code;
        if (signal?.aborted && code !== 0) {
          settle(
            new AgentError("Cancelled", "Upload cancelled", {
              output: Buffer.concat(stdout).toString("utf-8").trimEnd(),
            }),
          );
        }
      });

      child.on("close", (code: number | null) => {
        const output = Buffer.concat(stdout).toString("utf-8").trimEnd();

        // An agent that already exited 0 finished its upload, abort or not.
        if (signal?.aborted && code !== 0) {
          settle(new AgentError("Cancelled", "Upload cancelled", { output }));
          return;
        }

        if (code !== 0) {
          const diagnostics = Buffer.concat(stderr).toString("utf-8").trim();
          logger.warn(`Upload agent exited with status ${code}`, {
            stderr: diagnostics || undefined,
          });
          settle(
            new AgentError(
              "NonZeroExit",
              `Upload agent exited with status ${code ?? "unknown"}${diagnostics ? `: ${diagnostics}` : ""}`,
              { exitCode: code ?? undefined, output },
            ),
          );
          return;
        }

        if (!output) {
          settle(
            new AgentError("EmptyResponse", "Upload agent returned no URL", {
              exitCode: 0,
              output,
            }),
          );
          return;
        }

        settle(null, output);
      });
    });
  }
}
