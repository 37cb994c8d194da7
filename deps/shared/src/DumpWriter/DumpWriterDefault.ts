import { format } from "date-fns";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";

import type { DumpWriter } from "./DumpWriter";

export class DumpWriterDefault implements DumpWriter {
  private readonly startedAt = format(new Date(), "yyyyMMdd-HHmmss");

  constructor(
    private readonly logger: Logger,
    private readonly dir = "reports"
  ) {}

  async dump(name: string, data: unknown): Promise<string> {
    await mkdir(this.dir, { recursive: true });
    const filePath = path.join(
      this.dir,
      `${this.startedAt}-${toSafeFileName(name)}.json`
    );
    await writeFile(filePath, JSON.stringify(data, null, 2), "utf8");
    this.logger.info({ emoji: "🗂️", event: "dump" })`報告已輸出: ${filePath}`;
    return filePath;
  }
}

function toSafeFileName(name: string) {
  return name.replace(/[\\/:*?"<>|\s]+/g, "_");
}
