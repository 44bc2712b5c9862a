import fs from "fs/promises";
import path from "path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { UploaderService } from "../src/services/uploader.service";
import { EncryptionService } from "../src/services/encryption.service";
import { KeyringService } from "../src/services/keyring.service";
import { ResultService } from "../src/services/result.service";
import type { TransferAgent } from "../src/services/agent.service";
import type { Notification, UploadJob } from "../src/models/upload.model";
import { AgentError } from "../src/utils/errors";
import { StaticKeyringBackend, decryptWithPassphrase, makeTempDir } from "./helpers";

let dir: string;

beforeEach(async () => {
  dir = await makeTempDir();
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

function setup(
  invoke: TransferAgent["invoke"],
  passphrase: () => Promise<string | undefined> = async () => "x",
) {
  const agent = { invoke: vi.fn(invoke) };
  const notifier = vi.fn((_notification: Notification) => undefined);
  const results = new ResultService(notifier);
  const encryption = new EncryptionService(
    new KeyringService(new StaticKeyringBackend()),
    passphrase,
  );
  const uploader = new UploaderService(agent, encryption, results, {
    baseUrl: "https://example.test",
    tempFileLocation: path.join(dir, "upload.tmp"),
  });
  return { agent, notifier, results, uploader };
}

function fileJob(filePath: string, overrides: Partial<UploadJob> = {}): UploadJob {
  return {
    id: `job-${Math.random().toString(16).slice(2)}`,
    source: { kind: "file", path: filePath },
    remoteFileName: path.basename(filePath),
    async: false,
    ...overrides,
  };
}

describe("UploaderService.upload", () => {
  it("uploads an existing file to baseUrl/remoteFileName", async () => {
    const notes = path.join(dir, "notes.txt");
    await fs.writeFile(notes, "meeting notes");
    const { agent, notifier, results, uploader } = setup(async () => "https://example.test/Ab12/notes.txt");

    const result = await uploader.upload(fileJob(notes, { remoteFileName: "u/notes.txt" }));

    expect(agent.invoke).toHaveBeenCalledWith(
      notes,
      "https://example.test/u/notes.txt",
      expect.any(AbortSignal),
    );
    expect(result).toEqual({
      ok: true,
      jobId: expect.any(String),
      remoteFileName: "u/notes.txt",
      url: "https://example.test/Ab12/notes.txt",
      exitCode: 0,
    });
    expect(results.getLastUrl()).toBe("https://example.test/Ab12/notes.txt");
    expect(notifier).toHaveBeenCalledWith({
      level: "info",
      message: 'File "u/notes.txt" uploaded: https://example.test/Ab12/notes.txt',
    });
    expect(uploader.activeJobCount).toBe(0);
  });

  it("never reaches the success path when the agent exits non-zero", async () => {
    const notes = path.join(dir, "notes.txt");
    await fs.writeFile(notes, "meeting notes");
    const { notifier, results, uploader } = setup(async () => {
      throw new AgentError("NonZeroExit", "Upload agent exited with status 1", {
        exitCode: 1,
        output: "502 Bad Gateway",
      });
    });

    const result = await uploader.upload(fileJob(notes));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(AgentError);
    expect(result.error.kind).toBe("NonZeroExit");
    expect(result.exitCode).toBe(1);
    expect(result.output).toBe("502 Bad Gateway");
    expect(results.getLastUrl()).toBeNull();
    expect(notifier).toHaveBeenCalledTimes(1);
    expect(notifier).toHaveBeenCalledWith({
      level: "error",
      message: 'Upload of "notes.txt" failed: Upload agent exited with status 1',
    });
  });

  it("stops before the agent when the source cannot be read", async () => {
    const { agent, uploader } = setup(async () => "https://example.test/x");

    const result = await uploader.upload(fileJob(path.join(dir, "missing.txt")));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.name).toBe("IOError");
    expect(result.error.kind).toBe("SourceUnreadable");
    expect(agent.invoke).not.toHaveBeenCalled();
  });

  it("rejects a directory as source", async () => {
    const { agent, uploader } = setup(async () => "https://example.test/x");

    const result = await uploader.upload(fileJob(dir));

    expect(result.ok).toBe(false);
    expect(agent.invoke).not.toHaveBeenCalled();
  });

  it("writes buffers to a per-job temp file", async () => {
    const seen: Array<{ localPath: string; content: string }> = [];
    const { uploader } = setup(async (localPath) => {
      seen.push({ localPath, content: await fs.readFile(localPath, "utf-8") });
      return "https://example.test/x";
    });

    await uploader.upload({
      id: "job-a",
      source: { kind: "buffer", data: Buffer.from("first") },
      remoteFileName: "a.txt",
      async: false,
    });
    await uploader.upload({
      id: "job-b",
      source: { kind: "buffer", data: Buffer.from("second") },
      remoteFileName: "b.txt",
      async: false,
    });

    expect(seen).toEqual([
      { localPath: path.join(dir, "upload.tmp.job-a"), content: "first" },
      { localPath: path.join(dir, "upload.tmp.job-b"), content: "second" },
    ]);
  });

  it("uploads the ciphertext instead of the plaintext", async () => {
    let uploadedPath = "";
    let uploaded = Buffer.alloc(0);
    const { uploader } = setup(async (localPath) => {
      uploadedPath = localPath;
      uploaded = await fs.readFile(localPath);
      return "https://example.test/enc";
    }, async () => "x");

    const result = await uploader.upload({
      id: "job-enc",
      source: { kind: "buffer", data: Buffer.from("hello") },
      remoteFileName: "hello.txt",
      async: false,
      encryption: { recipients: [] },
    });

    expect(result.ok).toBe(true);
    expect(uploadedPath).toBe(path.join(dir, "upload.tmp.job-enc.gpg"));
    expect(uploaded.equals(Buffer.from("hello"))).toBe(false);
    await expect(decryptWithPassphrase(uploaded, "x")).resolves.toBe("hello");
  });

  it("fails closed when encryption cannot proceed", async () => {
    const { agent, results, uploader } = setup(async () => "https://example.test/x", async () => undefined);

    const result = await uploader.upload({
      id: "job-nopass",
      source: { kind: "buffer", data: Buffer.from("hello") },
      remoteFileName: "hello.txt",
      async: false,
      encryption: { recipients: [] },
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("NoPassphrase");
    expect(agent.invoke).not.toHaveBeenCalled();
    expect(results.getLastUrl()).toBeNull();
  });

  it("fails closed on an unknown recipient", async () => {
    const { agent, uploader } = setup(async () => "https://example.test/x");

    const result = await uploader.upload({
      id: "job-unknown",
      source: { kind: "buffer", data: Buffer.from("hello") },
      remoteFileName: "hello.txt",
      async: false,
      encryption: { recipients: ["Eve - eve@example.test - 00"] },
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("UnknownKey");
    expect(agent.invoke).not.toHaveBeenCalled();
  });
});

describe("UploaderService.uploadAsync", () => {
  it("returns a handle before the pipeline starts", async () => {
    const notes = path.join(dir, "notes.txt");
    await fs.writeFile(notes, "meeting notes");
    const { agent, uploader } = setup(async () => "https://example.test/bg");

    const handle = uploader.uploadAsync(fileJob(notes, { async: true }));

    expect(handle.state).toBe("resolving");
    expect(agent.invoke).not.toHaveBeenCalled();
    expect(uploader.activeJobCount).toBe(1);

    const result = await handle.result;
    expect(result.ok).toBe(true);
    expect(handle.state).toBe("completed");
    expect(uploader.activeJobCount).toBe(0);
  });

  it("cancels a job that has not reached the agent", async () => {
    const notes = path.join(dir, "notes.txt");
    await fs.writeFile(notes, "meeting notes");
    const { agent, uploader } = setup(async () => "https://example.test/bg");

    const handle = uploader.uploadAsync(fileJob(notes, { async: true }));
    handle.cancel();
    const result = await handle.result;

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("Cancelled");
    expect(handle.state).toBe("failed");
    expect(agent.invoke).not.toHaveBeenCalled();
  });

  it("cancels a running agent by job id", async () => {
    const notes = path.join(dir, "notes.txt");
    await fs.writeFile(notes, "meeting notes");
    const { agent, uploader } = setup(
      (_localPath, _remoteUrl, signal) =>
        new Promise<string>((_resolve, reject) => {
          signal?.addEventListener("abort", () =>
            reject(new AgentError("Cancelled", "Upload cancelled")),
          );
        }),
    );

    const handle = uploader.uploadAsync(fileJob(notes, { id: "job-running", async: true }));
    await vi.waitFor(() => expect(agent.invoke).toHaveBeenCalled());
    expect(handle.state).toBe("uploading");

    expect(uploader.cancel("job-running")).toBe(true);
    const result = await handle.result;

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("Cancelled");
    expect(uploader.cancel("job-running")).toBe(false);
  });

  it("keeps concurrent jobs on separate temp files", async () => {
    const paths: string[] = [];
    const { uploader } = setup(async (localPath) => {
      paths.push(localPath);
      return "https://example.test/x";
    });

    const handles = ["one", "two", "three"].map((name) =>
      uploader.uploadAsync({
        id: `job-${name}`,
        source: { kind: "buffer", data: Buffer.from(name) },
        remoteFileName: `${name}.txt`,
        async: true,
      }),
    );
    await Promise.all(handles.map((handle) => handle.result));

    expect(new Set(paths).size).toBe(3);
  });
});
