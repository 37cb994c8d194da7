import path from "node:path";

import type { Logger } from "~shared/Logger";

import type { MediaItem, SnapDate } from "@/types";

import type { OutputAssignment, OutputPathAssigner } from "./OutputPathAssigner";
import type { ReconciledMedia } from "./SnapDateReconciler";

/**
 * 例：2024/3/2024-3-5-14h30_IMG1.jpg、2024/3/2024-3-5-14h30m45s_VID2.mp4
 * 秒數為 0 時省略 m..s 段落。
 */
export function canonicalOutputPath(
  item: MediaItem,
  d: SnapDate,
  duplicateCount: number
) {
  const tag = item.category === "video" ? "VID" : "IMG";
  const seconds = d.second ? `m${d.second}s` : "";
  const fileName = `${d.year}-${d.month}-${d.day}-${d.hour}h${d.minute}${seconds}_${tag}${duplicateCount}.${item.extension}`;
  return path.posix.join(String(d.year), String(d.month), fileName);
}

export class OutputPathAssignerDefault implements OutputPathAssigner {
  private readonly usedPaths = new Set<string>();
  private readonly logger: Logger;

  constructor(deps: { logger: Logger }) {
    this.logger = deps.logger.extend("OutputPathAssigner");
  }

  get assignedCount() {
    return this.usedPaths.size;
  }

  assign({ item, reconciled }: ReconciledMedia): OutputAssignment {
    let duplicateCount = 1;
    let outputPath = canonicalOutputPath(item, reconciled.snapDate, duplicateCount);
    while (this.usedPaths.has(outputPath)) {
      duplicateCount++;
      outputPath = canonicalOutputPath(item, reconciled.snapDate, duplicateCount);
    }
    this.usedPaths.add(outputPath);

    this.logger.debug({
      duplicateCount,
    })`${item.filePath} → ${outputPath}`;
    return Object.freeze({
      sourcePath: item.filePath,
      outputPath,
      snapDate: reconciled.snapDate,
      duplicateCount,
    });
  }

  async *assignAll(
    stream: AsyncIterable<ReconciledMedia> | Iterable<ReconciledMedia>
  ): AsyncGenerator<OutputAssignment> {
    for await (const media of stream) {
      yield this.assign(media);
    }
  }
}
