import type { SnapDate } from "@/types";

import type { ReconciledMedia } from "./SnapDateReconciler";

export type OutputAssignment = Readonly<{
  sourcePath: string;
  /** 相對於輸出根目錄，以 "/" 分隔 */
  outputPath: string;
  snapDate: SnapDate;
  duplicateCount: number;
}>;

/**
 * 一個 instance 即一次指派工作階段：已使用的路徑只增不減，
 * 後續項目的流水號取決於先前所有的指派結果，因此必須依序處理。
 */
export interface OutputPathAssigner {
  assign(media: ReconciledMedia): OutputAssignment;
  assignAll(
    stream: AsyncIterable<ReconciledMedia> | Iterable<ReconciledMedia>
  ): AsyncGenerator<OutputAssignment>;
}
