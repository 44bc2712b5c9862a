import fs from "fs/promises";
import { constants } from "fs";
import path from "path";

export type ExecutableProbe = (name: string) => Promise<string | null>;

async function isExecutable(candidate: string): Promise<boolean> {
  try {
    const stats = await fs.stat(candidate);
    if (!stats.isFile()) return false;
    await fs.access(candidate, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Locates an executable the way a shell would: names containing a path
 * separator are checked as-is, bare names are searched along PATH.
 */
export async function findExecutable(
  name: string,
  searchPath: string | undefined = process.env.PATH,
): Promise<string | null> {
  if (name.includes("/") || name.includes(path.sep)) {
    const absolute = path.resolve(name);
    return (await isExecutable(absolute)) ? absolute : null;
  }

  for (const dir of (searchPath || "").split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, name);
    if (await isExecutable(candidate)) {
      return candidate;
    }
  }
  return null;
}
