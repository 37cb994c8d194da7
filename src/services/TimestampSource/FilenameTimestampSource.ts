import type { Logger } from "~shared/Logger";
import { err, isErr, ok } from "~shared/utils/Result";

import { filenameDatePatterns } from "@/constants";
import type { MediaItem } from "@/types";
import { type SnapDateParts, createSnapDate } from "@/utils/snapDate";

import type { TimestampEvidence, TimestampSource } from "./TimestampSource";

const partNames = ["year", "month", "day", "hour", "minute", "second"] as const;

export class FilenameTimestampSource implements TimestampSource {
  readonly name = "filename";

  constructor(
    private readonly patterns: readonly RegExp[] = filenameDatePatterns
  ) {}

  async lookup(item: MediaItem, logger: Logger): Promise<TimestampEvidence> {
    const match = matchFirst(this.patterns, item.fileName);
    if (!match) {
      return err({ type: "NO_EVIDENCE", message: "檔名不符合任何日期樣式" });
    }

    const snapDate = createSnapDate(match.parts);
    if (isErr(snapDate)) {
      logger.warn({
        event: "malformed-filename-date",
        pattern: match.pattern.source,
        parts: match.parts,
      })`檔名中的日期無效 (${item.fileName})，略過`;
      return err({
        type: "MALFORMED_EVIDENCE",
        message: snapDate.error.message,
      });
    }
    return ok(snapDate.value);
  }
}

/** 第一個符合的樣式即採用，只帶入有比對到的欄位 */
export function matchFirst(patterns: readonly RegExp[], fileName: string) {
  for (const pattern of patterns) {
    const groups = pattern.exec(fileName)?.groups;
    if (!groups) continue;

    const parts: SnapDateParts = {};
    for (const name of partNames) {
      const value = groups[name];
      if (value) parts[name] = Number.parseInt(value, 10);
    }
    return { pattern, parts };
  }
  return undefined;
}
