import type { Logger } from "~shared/Logger";
import type { Result } from "~shared/utils/Result";

import type { MediaItem, SnapDate } from "@/types";

export type EvidenceErrorType =
  | "NO_EVIDENCE"
  | "MALFORMED_EVIDENCE"
  | "UNSUPPORTED_TYPE";

export type EvidenceError = { type: EvidenceErrorType; message: string };

export type TimestampEvidence = Result<SnapDate, EvidenceError>;

/**
 * 單一時間證據來源。每個項目最多查詢一次；
 * 找不到或格式錯誤時回傳 err，不應拋出例外。
 */
export interface TimestampSource {
  readonly name: string;
  lookup(item: MediaItem, logger: Logger): Promise<TimestampEvidence>;
}
