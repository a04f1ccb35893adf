import path from "node:path";
import type { CommandFileSystem } from "../../src/infrastructure/CommandFileSystem.js";

type Entry = string | Error;

/**
 * In-process stand-in for the command directory. Files given an `Error` throw it on read.
 */
export class MemoryFileSystem implements CommandFileSystem {
  private readonly files = new Map<string, Entry>();
  private readonly dirs = new Set<string>();
  private readonly reads: string[] = [];
  private listingError: Error | undefined;

  withDir(dir: string) {
    this.dirs.add(path.resolve(dir));
    return this;
  }

  withFile(filePath: string, content: Entry) {
    const resolved = path.resolve(filePath);
    this.files.set(resolved, content);
    this.dirs.add(path.dirname(resolved));
    return this;
  }

  /** The directory exists, but listing it throws `error`. */
  withUnlistableDir(dir: string, error: Error) {
    this.dirs.add(path.resolve(dir));
    this.listingError = error;
    return this;
  }

  isDirectory(dir: string): boolean {
    return this.dirs.has(path.resolve(dir));
  }

  listFiles(dir: string, extension: string): string[] {
    if (this.listingError) throw this.listingError;
    const resolved = path.resolve(dir);
    return [...this.files.keys()]
      .filter(file => path.dirname(file) === resolved && file.endsWith(extension))
      .sort();
  }

  readText(file: string): string {
    this.reads.push(file);
    const entry = this.files.get(path.resolve(file));
    if (entry === undefined) throw new Error(`ENOENT: no such file, open '${file}'`);
    if (entry instanceof Error) throw entry;
    return entry;
  }

  readCalls() {
    return [...this.reads];
  }
}
