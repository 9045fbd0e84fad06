// src/util/fs.ts
import { mkdir, readFile, writeFile as fsWriteFile } from "fs/promises";
import { dirname } from "path";

/**
 * Resolve a file shipped at the package root (data/, sql/). Both src/util
 * and dist/util sit two levels below it.
 */
export function resourceUrl(relativePath: string): URL {
  return new URL(`../../${relativePath}`, import.meta.url);
}

/** Parsed JSON; callers validate the shape. */
export async function readJsonFile(location: string | URL): Promise<unknown> {
  return JSON.parse(await readFile(location, "utf-8"));
}

/**
 * Write a text file, creating its directory first.
 */
export async function writeFile(
  filePath: string,
  content: string
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await fsWriteFile(filePath, content, "utf-8");
}
