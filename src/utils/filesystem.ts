import * as fs from "fs";
import * as path from "path";

/**
 * Utilities for file system operations. Read and write failures are not
 * caught here; they abort the run.
 */

export function directoryExists(dirPath: string): boolean {
  return fs.existsSync(dirPath) && fs.statSync(dirPath).isDirectory();
}

/**
 * Recursively list files under `directory` whose extension is `extension`
 * (with the dot, e.g. ".po"). Entries are visited in name order.
 */
export function findFilesRecursive(
  directory: string,
  extension: string
): string[] {
  const results: string[] = [];
  const entries = fs
    .readdirSync(directory, { withFileTypes: true })
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const fullPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      results.push(...findFilesRecursive(fullPath, extension));
    } else if (entry.isFile() && path.extname(entry.name) === extension) {
      results.push(fullPath);
    }
  }

  return results;
}

export function loadText(filePath: string): string {
  return fs.readFileSync(filePath, "utf-8");
}

export function saveText(filePath: string, text: string): void {
  fs.writeFileSync(filePath, text);
}
