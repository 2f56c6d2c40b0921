import { promises as fs } from "fs";
import path from "path";
import { parse as parseLossless, stringify as stringifyLossless } from "lossless-json";

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function writeJson(filePath: string, data: unknown): Promise<void> {
  const dir = path.dirname(filePath);
  await ensureDir(dir);
  await fs.writeFile(filePath, JSON.stringify(data, null, 2) + "\n", "utf8");
}

/** Numbers stay LosslessNumber values, so digits and formatting survive a rewrite. */
export async function readLosslessJson(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, "utf8");
  return parseLossless(content);
}

export async function writeLosslessJson(filePath: string, data: unknown): Promise<void> {
  const content = stringifyLossless(data, undefined, 2);
  if (content === undefined) {
    throw new Error(`Nothing to write to ${filePath}`);
  }
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, content + "\n", "utf8");
}

export async function copyFile(srcPath: string, destPath: string): Promise<void> {
  const dir = path.dirname(destPath);
  await ensureDir(dir);
  await fs.copyFile(srcPath, destPath);
}
