import { readFile } from "fs/promises";

/**
 * Read a newline-delimited list, trimming entries and skipping blank lines
 */
export async function readLineList(path: string): Promise<string[]> {
  const content = await readFile(path, "utf-8");
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
