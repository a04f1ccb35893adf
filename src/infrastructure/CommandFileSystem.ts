import * as fs from "node:fs";
import * as path from "node:path";

const UTF8 = new TextDecoder("utf-8", { fatal: true });

/**
 * The only I/O the registry performs: one directory scan and one read per file.
 */
export interface CommandFileSystem {
  isDirectory(dir: string): boolean;
  /** Regular files directly inside `dir` whose name ends with `extension`, sorted. */
  listFiles(dir: string, extension: string): string[];
  readText(file: string): string;
}

export class NodeCommandFileSystem implements CommandFileSystem {
  isDirectory(dir: string): boolean {
    try {
      return fs.statSync(dir).isDirectory();
    } catch {
      return false;
    }
  }

  listFiles(dir: string, extension: string): string[] {
    return fs
      .readdirSync(dir, { withFileTypes: true })
      .filter(entry => entry.name.endsWith(extension) && isRegularFile(dir, entry))
      .map(entry => path.join(dir, entry.name))
      .sort();
  }

  /** Throws on bytes that are not valid UTF-8 instead of substituting U+FFFD. */
  readText(file: string): string {
    return UTF8.decode(fs.readFileSync(file));
  }
}

function isRegularFile(dir: string, entry: fs.Dirent) {
  if (entry.isFile()) return true;
  if (!entry.isSymbolicLink()) return false;
  try {
    return fs.statSync(path.join(dir, entry.name)).isFile();
  } catch {
    return false;
  }
}
