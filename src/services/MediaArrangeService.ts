import type { OutputAssignment } from "./OutputPathAssigner";
import type { ReconciliationFailure } from "./SnapDateReconciler";

export type ArrangeEvent =
  | { type: "assigned"; assignment: OutputAssignment }
  | { type: "skipped"; failure: ReconciliationFailure }
  | { type: "ignored"; filePath: string; reason: string };

export interface MediaArrangeService {
  /**
   * 將檔案路徑串流轉為指派結果串流。單次、依輸入順序、逐筆產生；
   * 單一檔案失敗只會產生 skipped 事件，不會中斷整批。
   */
  plan(
    filePaths: AsyncIterable<string> | Iterable<string>
  ): AsyncGenerator<ArrangeEvent>;
}
