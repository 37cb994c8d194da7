import type { CAC } from "cac";

import type { Logger } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";
import type { Result } from "~shared/utils/Result";

import { getAppConfig } from "@/config";
import { ExifServiceExifTool } from "@/services/ExifService";
import type {
  ReconciledDate,
  ReconciliationFailure,
} from "@/services/SnapDateReconciler";
import { SnapDateReconcilerDefault } from "@/services/SnapDateReconcilerDefault";
import {
  FilenameTimestampSource,
  MetadataTimestampSource,
  type TimestampEvidence,
  type TimestampSource,
} from "@/services/TimestampSource";
import { VideoProbeServiceFFprobe } from "@/services/VideoProbeService";
import { createMediaItem } from "@/utils/mediaItem";
import { formatSnapDate } from "@/utils/snapDate";

export type InspectReport = {
  file: string;
  /** 來源名稱 → 證據；來源拋出例外時不會出現在此 */
  evidence: Map<string, TimestampEvidence>;
  result: Result<ReconciledDate, ReconciliationFailure>;
};

export function registerInspectDate(cli: CAC, baseLogger: Logger) {
  cli
    .command("inspect <...files>", "列出每個檔案各來源的時間證據與最終判定")
    .action(async (files: string[]) => {
      const config = getAppConfig();
      const exifService = new ExifServiceExifTool();
      try {
        await inspectDates(files, {
          logger: baseLogger.extend("inspect"),
          sources: [
            new MetadataTimestampSource({
              exifService,
              videoProbeService: new VideoProbeServiceFFprobe({
                ffprobePath: config.FFPROBE_PATH,
              }),
            }),
            new FilenameTimestampSource(),
          ],
        });
      } finally {
        await dispose(exifService);
      }
    });
}

/**
 * 每個檔案只執行一次判定；各來源的結果在判定過程中順便記下，
 * 不會為了顯示而重複讀取 exif 或 ffprobe。
 */
export async function inspectDates(
  files: readonly string[],
  deps: { logger: Logger; sources: readonly TimestampSource[] }
): Promise<InspectReport[]> {
  const { logger } = deps;
  let evidence = new Map<string, TimestampEvidence>();
  const recording = deps.sources.map(
    (source): TimestampSource => ({
      name: source.name,
      async lookup(item, sourceLogger) {
        const found = await source.lookup(item, sourceLogger);
        evidence.set(source.name, found);
        return found;
      },
    })
  );
  const reconciler = new SnapDateReconcilerDefault({
    sources: recording,
    logger,
  });

  const reports: InspectReport[] = [];
  for (const file of files) {
    evidence = new Map();
    const result = await reconciler.reconcile(createMediaItem(file));
    const fileLogger = logger.append({ file });

    for (const source of deps.sources) {
      const found = evidence.get(source.name);
      if (!found) {
        fileLogger.info({ emoji: "💥" })`${source.name}: 讀取時發生例外`;
      } else if (found.ok) {
        fileLogger.info({
          emoji: "🕒",
        })`${source.name}: ${formatSnapDate(found.value)}`;
      } else {
        fileLogger.info({
          emoji: "➖",
        })`${source.name}: ${found.error.type} ${found.error.message}`;
      }
    }

    if (result.ok) {
      fileLogger.info({
        event: "done",
        source: result.value.source,
      })`${file} → ${formatSnapDate(result.value.snapDate)}`;
    } else {
      fileLogger.error({
        reason: result.error.type,
      })`${file}: ${result.error.message}`;
    }
    reports.push({ file, evidence, result });
  }
  return reports;
}
