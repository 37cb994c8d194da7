import { readdir } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import type {
  FileSystemScanner,
  ScanError,
  ScanOptions,
} from "./FileSystemScanner";

export class FileSystemScannerDefault implements FileSystemScanner {
  async *walk(rootPath: string, options?: ScanOptions): AsyncGenerator<string> {
    const allowExts = options?.allowExts ?? [];
    const isRecursive = options?.recursive ?? true;
    const allowExtsSet = new Set(
      allowExts.map((e) =>
        e.startsWith(".") ? e.toLowerCase() : `.${e.toLowerCase()}`
      )
    );
    const accepts = (name: string) =>
      allowExtsSet.size === 0 ||
      allowExtsSet.has(path.extname(name).toLowerCase());

    yield* walkDir(rootPath, isRecursive, accepts);
  }

  async scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<string[], ScanError>> {
    try {
      const files: string[] = [];
      for await (const file of this.walk(rootPath, options)) {
        files.push(file);
      }
      return ok(files);
    } catch (e) {
      return err({
        type: "SCAN_FAILED",
        message: e instanceof Error ? e.message : String(e),
      });
    }
  }
}

async function* walkDir(
  dir: string,
  recursive: boolean,
  accepts: (name: string) => boolean
): AsyncGenerator<string> {
  const dirents = await readdir(dir, { withFileTypes: true });
  dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const dirent of dirents) {
    const fullPath = path.join(dir, dirent.name);
    if (dirent.isDirectory()) {
      if (recursive) yield* walkDir(fullPath, recursive, accepts);
    } else if (dirent.isFile() && accepts(dirent.name)) {
      yield fullPath;
    }
  }
}
