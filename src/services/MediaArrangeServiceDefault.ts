import type { Logger } from "~shared/Logger";

import type { ReconciledMedia } from "@/services/SnapDateReconciler";
import { createMediaItem } from "@/utils/mediaItem";

import type { ArrangeEvent, MediaArrangeService } from "./MediaArrangeService";
import type { OutputPathAssigner } from "./OutputPathAssigner";
import { OutputPathAssignerDefault } from "./OutputPathAssignerDefault";
import type { SnapDateReconciler } from "./SnapDateReconciler";

export class MediaArrangeServiceDefault implements MediaArrangeService {
  private readonly reconciler: SnapDateReconciler;
  private readonly createAssigner: () => OutputPathAssigner;
  private readonly logger: Logger;

  constructor(deps: {
    reconciler: SnapDateReconciler;
    logger: Logger;
    createAssigner?: () => OutputPathAssigner;
  }) {
    this.reconciler = deps.reconciler;
    this.logger = deps.logger.extend("MediaArrangeService");
    this.createAssigner =
      deps.createAssigner ??
      (() => new OutputPathAssignerDefault({ logger: this.logger }));
  }

  async *plan(
    filePaths: AsyncIterable<string> | Iterable<string>
  ): AsyncGenerator<ArrangeEvent> {
    // 每次 plan 為一個獨立的指派工作階段
    const assigner = this.createAssigner();
    const pending: ArrangeEvent[] = [];
    const reconciled = this.reconcileAll(filePaths, (event) =>
      pending.push(event)
    );

    for await (const assignment of assigner.assignAll(reconciled)) {
      yield* pending.splice(0);
      yield { type: "assigned", assignment };
    }
    yield* pending.splice(0);
  }

  private async *reconcileAll(
    filePaths: AsyncIterable<string> | Iterable<string>,
    report: (event: ArrangeEvent) => void
  ): AsyncGenerator<ReconciledMedia> {
    for await (const filePath of filePaths) {
      const item = createMediaItem(filePath);
      if (!item.category) {
        this.logger.debug()`不支援的檔案類型，略過: ${filePath}`;
        report({ type: "ignored", filePath, reason: "UNSUPPORTED_TYPE" });
        continue;
      }

      this.logger.debug({ event: "consider" })`處理 ${filePath}`;
      const result = await this.reconciler.reconcile(item);
      if (!result.ok) {
        this.logger.error({
          event: "skip",
          reason: result.error.type,
        })`無法判斷 ${filePath} 的拍攝時間，略過`;
        report({ type: "skipped", failure: result.error });
        continue;
      }
      yield { item, reconciled: result.value };
    }
  }
}
