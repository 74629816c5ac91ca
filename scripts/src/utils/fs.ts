import { promises as fs } from "node:fs";
import { dirname } from "node:path";
import fsExtra from "fs-extra";

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

function ensureLf(content: string): string {
  return content.replace(/\r\n/g, "\n");
}

function ensureTrailingNewline(content: string): string {
  return content.endsWith("\n") ? content : `${content}\n`;
}

export async function readTextFile(path: string): Promise<string | null> {
  try {
    return await fs.readFile(path, "utf8");
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "EISDIR")) {
      return null;
    }
    throw error;
  }
}

export async function writeTextFile(path: string, content: string): Promise<void> {
  await fsExtra.ensureDir(dirname(path));
  await fs.writeFile(path, ensureTrailingNewline(ensureLf(content)), "utf8");
}

export async function readJsonFile(path: string): Promise<unknown> {
  const raw = await readTextFile(path);
  if (raw === null) {
    return null;
  }
  return JSON.parse(raw);
}

export async function writeJsonFile(path: string, data: unknown): Promise<void> {
  await writeTextFile(path, JSON.stringify(data, null, 2));
}
