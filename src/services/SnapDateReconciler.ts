import type { Result } from "~shared/utils/Result";

import type { MediaItem, SnapDate } from "@/types";

export interface SnapDateReconciler {
  /**
   * 綜合所有證據來源，決定單一拍攝時間。
   * 只有「完全沒有證據」與「來源日期不一致」兩種失敗會回傳給呼叫端。
   */
  reconcile(
    item: MediaItem
  ): Promise<Result<ReconciledDate, ReconciliationFailure>>;
}

export type ReconciledDate = Readonly<{
  snapDate: SnapDate;
  /** 被採用的來源名稱 */
  source: string;
  warnings: readonly ReconcileWarning[];
}>;

export type ReconcileWarning = Readonly<{
  type: "LOOSE_MATCH" | "DATE_MISMATCH_IGNORED" | "FILE_TIME_FALLBACK";
  source: string;
  message: string;
}>;

export type ReconciliationFailure = Readonly<{
  type: "NO_EVIDENCE" | "SOURCES_DISAGREE";
  filePath: string;
  message: string;
}>;

export type ReconciledMedia = Readonly<{
  item: MediaItem;
  reconciled: ReconciledDate;
}>;
