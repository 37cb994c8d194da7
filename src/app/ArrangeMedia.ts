import type { CAC } from "cac";
import { mkdir } from "node:fs/promises";
import path from "node:path";

import type { DumpWriter } from "~shared/DumpWriter/DumpWriter";
import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";
import { type Result, err, ok } from "~shared/utils/Result";

import { getAppConfig } from "@/config";
import { supportedExtensions } from "@/constants";
import { ExifServiceExifTool } from "@/services/ExifService";
import {
  type FileSystemScanner,
  FileSystemScannerDefault,
} from "@/services/FileSystemScanner";
import type { MediaArrangeService } from "@/services/MediaArrangeService";
import { MediaArrangeServiceDefault } from "@/services/MediaArrangeServiceDefault";
import type { OutputAssignment } from "@/services/OutputPathAssigner";
import type { ReconciliationFailure } from "@/services/SnapDateReconciler";
import { SnapDateReconcilerDefault } from "@/services/SnapDateReconcilerDefault";
import {
  FileTimeTimestampSource,
  FilenameTimestampSource,
  MetadataTimestampSource,
} from "@/services/TimestampSource";
import { VideoProbeServiceFFprobe } from "@/services/VideoProbeService";
import {
  confirm,
  copyFileExclusive,
  exists,
  expandHome,
  moveFile,
} from "@/utils/helper";

type ArrangeCliOptions = {
  target?: string;
  copy?: boolean;
  dryRun?: boolean;
  yes?: boolean;
  recursive?: boolean;
  allowDateMismatch?: boolean;
  fallbackFileTime?: boolean;
};

export type ArrangeOptions = {
  targetRoot: string;
  copy?: boolean;
  dryRun?: boolean;
  yes?: boolean;
  recursive?: boolean;
};

export type ArrangeDeps = {
  logger: Logger;
  arranger: MediaArrangeService;
  reporter: DumpWriter;
  scanner?: FileSystemScanner;
  confirm?: (question: string) => Promise<boolean>;
};

export type ArrangeOutcome = {
  planned: OutputAssignment[];
  skipped: ReconciliationFailure[];
  /** 目標已存在而略過的項目 */
  conflicts: OutputAssignment[];
  transferred: number;
  failed: number;
  cancelled: boolean;
};

export type ArrangeError = {
  type: "SOURCE_NOT_FOUND";
  message: string;
};

export function registerArrangeMedia(cli: CAC, baseLogger: Logger) {
  cli
    .command("arrange <folder>", "依拍攝時間整理相片與影片到 <年>/<月> 目錄")
    .option("--target <path>", "輸出根目錄，預設為 TARGET_ROOT")
    .option("--copy", "複製而非搬移", { default: false })
    .option("--dry-run", "只輸出計劃，不搬移", { default: false })
    .option("--yes", "略過確認，直接執行", { default: false })
    .option("--no-recursive", "不進入子資料夾")
    .option("--allow-date-mismatch", "來源日期不一致時採用 metadata", {
      default: false,
    })
    .option("--fallback-file-time", "無任何證據時改用檔案時間", {
      default: false,
    })
    .action(async (folder: string, options: ArrangeCliOptions) => {
      const config = getAppConfig();
      const logger = baseLogger.extend("arrange", { folder });
      const exifService = new ExifServiceExifTool();
      const reconciler = new SnapDateReconcilerDefault({
        sources: [
          new MetadataTimestampSource({
            exifService,
            videoProbeService: new VideoProbeServiceFFprobe({
              ffprobePath: config.FFPROBE_PATH,
            }),
          }),
          new FilenameTimestampSource(),
        ],
        fallback: options.fallbackFileTime
          ? new FileTimeTimestampSource()
          : undefined,
        allowDateMismatch: options.allowDateMismatch,
        logger,
      });

      try {
        const result = await arrangeMedia(
          folder,
          {
            targetRoot: expandHome(options.target ?? config.TARGET_ROOT),
            copy: options.copy,
            dryRun: options.dryRun,
            yes: options.yes,
            recursive: options.recursive,
          },
          {
            logger,
            arranger: new MediaArrangeServiceDefault({ reconciler, logger }),
            reporter: new DumpWriterDefault(logger, config.REPORT_DIR),
          }
        );
        if (!result.ok) {
          process.exitCode = 1;
          return;
        }
        const { conflicts, failed } = result.value;
        if (conflicts.length > 0 || failed > 0) process.exitCode = 1;
      } finally {
        await dispose(exifService);
      }
    });
}

/**
 * 先完整產生計劃，再檢查所有目標，最後才搬移或複製。
 * 目標已存在或單筆搬移失敗時只略過該項目，其餘照常處理。
 */
export async function arrangeMedia(
  folder: string,
  options: ArrangeOptions,
  deps: ArrangeDeps
): Promise<Result<ArrangeOutcome, ArrangeError>> {
  const { logger, arranger, reporter } = deps;
  const scanner = deps.scanner ?? new FileSystemScannerDefault();
  const ask = deps.confirm ?? confirm;
  const targetRoot = path.resolve(options.targetRoot);
  const transfer = options.copy ? copyFileExclusive : moveFile;

  logger.info({ emoji: "📁" })`來源: ${folder} → 目標: ${targetRoot}`;
  if (!(await exists(folder))) {
    const message = `來源目錄不存在: ${folder}`;
    logger.error({ emoji: "❌" }, message);
    return err({ type: "SOURCE_NOT_FOUND", message });
  }

  const outcome: ArrangeOutcome = {
    planned: [],
    skipped: [],
    conflicts: [],
    transferred: 0,
    failed: 0,
    cancelled: false,
  };

  const files = outsideOf(
    targetRoot,
    scanner.walk(folder, {
      recursive: options.recursive ?? true,
      allowExts: supportedExtensions,
    })
  );
  for await (const event of arranger.plan(files)) {
    if (event.type === "assigned") outcome.planned.push(event.assignment);
    if (event.type === "skipped") outcome.skipped.push(event.failure);
  }

  logger.info({
    emoji: "✅",
    count: outcome.planned.length,
    skipped: outcome.skipped.length,
  })`計劃產生完成：${outcome.planned.length} 個檔案，${outcome.skipped.length} 個無法判斷時間`;
  if (outcome.skipped.length > 0) {
    await reporter.dump("skipped", outcome.skipped);
  }
  if (outcome.planned.length === 0) {
    logger.warn({ emoji: "🟡" })`沒有可處理項目`;
    return ok(outcome);
  }

  const ready: OutputAssignment[] = [];
  for (const assignment of outcome.planned) {
    const to = path.join(targetRoot, assignment.outputPath);
    if (await exists(to)) {
      logger.error({
        event: "target-exists",
        emoji: "🧨",
        from: assignment.sourcePath,
      })`目標 ${to} 已存在，略過（不覆蓋）`;
      outcome.conflicts.push(assignment);
    } else {
      ready.push(assignment);
    }
  }

  await reporter.dump("arrange-plan", summarizePlan(outcome.planned));
  if (outcome.conflicts.length > 0) {
    await reporter.dump("conflicts", summarizePlan(outcome.conflicts));
  }
  if (options.dryRun) {
    logger.info({ emoji: "📝" })`dry-run：僅輸出計劃`;
    return ok(outcome);
  }
  if (ready.length === 0) {
    logger.warn({ emoji: "🟡" })`所有目標皆已存在，沒有可處理項目`;
    return ok(outcome);
  }

  const verb = options.copy ? "複製" : "搬移";
  if (
    !options.yes &&
    !(await ask(`即將${verb} ${ready.length} 個檔案，是否繼續？ [y/N] `))
  ) {
    logger.warn({ emoji: "⏹️" })`使用者取消`;
    outcome.cancelled = true;
    return ok(outcome);
  }

  for (const assignment of ready) {
    const to = path.join(targetRoot, assignment.outputPath);
    try {
      await mkdir(path.dirname(to), { recursive: true });
      // 計劃確認後才出現的檔案同樣不覆蓋
      if (await exists(to)) {
        logger.error({
          event: "target-exists",
          emoji: "🧨",
          from: assignment.sourcePath,
        })`目標 ${to} 已存在，略過（不覆蓋）`;
        outcome.conflicts.push(assignment);
        continue;
      }
      await transfer(assignment.sourcePath, to);
      outcome.transferred++;
      logger.info({
        event: "moved",
        emoji: "📦",
      })`${assignment.sourcePath} → ${to}`;
    } catch (error) {
      outcome.failed++;
      logger.error({
        event: "transfer-failed",
        error,
        from: assignment.sourcePath,
      })`${verb}失敗: ${assignment.sourcePath} → ${to}`;
    }
  }

  logger.info({
    event: "done",
    transferred: outcome.transferred,
    conflicts: outcome.conflicts.length,
    failed: outcome.failed,
  })`全部完成，共${verb} ${outcome.transferred} 個檔案`;
  return ok(outcome);
}

/** 略過位於輸出根目錄內的檔案，避免同一次執行把已整理的檔案再整理一次 */
async function* outsideOf(
  targetRoot: string,
  files: AsyncIterable<string>
): AsyncGenerator<string> {
  for await (const file of files) {
    const rel = path.relative(targetRoot, path.resolve(file));
    if (rel === "" || (rel.split(path.sep)[0] !== ".." && !path.isAbsolute(rel))) {
      continue;
    }
    yield file;
  }
}

export function summarizePlan(planned: readonly OutputAssignment[]) {
  const byDir: Record<string, number> = {};
  for (const a of planned) {
    const dir = path.posix.dirname(a.outputPath);
    byDir[dir] = (byDir[dir] ?? 0) + 1;
  }
  return {
    total: planned.length,
    duplicates: planned.filter((a) => a.duplicateCount > 1).length,
    byDir,
    moves: planned.map((a) => ({ from: a.sourcePath, to: a.outputPath })),
  };
}
