import type { Stats } from "node:fs";
import { stat } from "node:fs/promises";

import type { Logger } from "~shared/Logger";
import { err, isErr, ok } from "~shared/utils/Result";

import type { MediaItem } from "@/types";
import { snapDateFromDate } from "@/utils/snapDate";

import type { TimestampEvidence, TimestampSource } from "./TimestampSource";

export type FileTimes = Pick<Stats, "birthtime" | "birthtimeMs" | "mtime">;

/**
 * 檔案建立時間；檔案系統不提供建立時間（birthtime 為 0）時改用修改時間。
 * 以本機時區的牆上時間表示。
 */
export class FileTimeTimestampSource implements TimestampSource {
  readonly name = "file-time";

  constructor(
    private readonly statFile: (filePath: string) => Promise<FileTimes> = stat
  ) {}

  async lookup(item: MediaItem, logger: Logger): Promise<TimestampEvidence> {
    let stats: FileTimes;
    try {
      stats = await this.statFile(item.filePath);
    } catch (e) {
      return err({
        type: "NO_EVIDENCE",
        message: `無法讀取檔案屬性: ${e instanceof Error ? e.message : String(e)}`,
      });
    }

    const useBirthtime = stats.birthtimeMs > 0;
    const date = useBirthtime ? stats.birthtime : stats.mtime;
    logger.debug({
      field: useBirthtime ? "birthtime" : "mtime",
    })`檔案時間: ${date.toISOString()}`;

    const snapDate = snapDateFromDate(date);
    if (isErr(snapDate)) {
      return err({
        type: "MALFORMED_EVIDENCE",
        message: snapDate.error.message,
      });
    }
    return ok(snapDate.value);
  }
}
