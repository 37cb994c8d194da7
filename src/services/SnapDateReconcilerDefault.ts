import { differenceInSeconds } from "date-fns";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import type { MediaItem, SnapDate } from "@/types";
import {
  formatSnapDate,
  isSameCalendarDay,
  isSameSnapDate,
  toUtcDate,
} from "@/utils/snapDate";

import type {
  ReconcileWarning,
  ReconciledDate,
  ReconciliationFailure,
  SnapDateReconciler,
} from "./SnapDateReconciler";
import type {
  TimestampEvidence,
  TimestampSource,
} from "./TimestampSource/TimestampSource";

type Found = { source: string; snapDate: SnapDate };

/**
 * 規則（依序）：
 * 1. 所有來源皆失敗 → NO_EVIDENCE（若有設定 fallback 來源則改用其結果並加上警告）
 * 2. 只有一個來源成功 → 採用該來源
 * 3. 多個來源成功，以優先序最高者為準，逐一比較其餘來源：
 *    - 完全相同 → 無警告
 *    - 同一天但時間不同 → 一筆 LOOSE_MATCH 警告
 *    - 不同天 → SOURCES_DISAGREE；allowDateMismatch 時改為警告並沿用優先來源
 */
export class SnapDateReconcilerDefault implements SnapDateReconciler {
  private readonly sources: readonly TimestampSource[];
  private readonly fallback: TimestampSource | undefined;
  private readonly allowDateMismatch: boolean;
  private readonly logger: Logger;

  constructor(deps: {
    /** 依優先序排列，通常為 metadata → filename */
    sources: readonly TimestampSource[];
    /** 僅在所有來源皆失敗時使用 */
    fallback?: TimestampSource;
    allowDateMismatch?: boolean;
    logger: Logger;
  }) {
    this.sources = deps.sources;
    this.fallback = deps.fallback;
    this.allowDateMismatch = deps.allowDateMismatch ?? false;
    this.logger = deps.logger.extend("SnapDateReconciler");
  }

  async reconcile(
    item: MediaItem
  ): Promise<Result<ReconciledDate, ReconciliationFailure>> {
    const logger = this.logger.append({ file: item.filePath });

    const found: Found[] = [];
    for (const source of this.sources) {
      const evidence = await this.lookup(source, item, logger);
      if (evidence.ok) found.push({ source: source.name, snapDate: evidence.value });
    }

    if (found.length === 0) return this.fallbackOrFail(item, logger);

    const [primary, ...others] = found;
    const warnings: ReconcileWarning[] = [];
    for (const other of others) {
      if (isSameSnapDate(primary.snapDate, other.snapDate)) {
        logger.debug(`${primary.source} 與 ${other.source} 的時間一致`);
        continue;
      }

      const diffSeconds = differenceInSeconds(
        toUtcDate(primary.snapDate),
        toUtcDate(other.snapDate)
      );
      if (isSameCalendarDay(primary.snapDate, other.snapDate)) {
        const message = `${primary.source} 與 ${other.source} 只有日期相符，採用 ${primary.source}`;
        logger.warn({
          event: "loose-match",
          [primary.source]: formatSnapDate(primary.snapDate),
          [other.source]: formatSnapDate(other.snapDate),
          diffSeconds,
        }, message);
        warnings.push({ type: "LOOSE_MATCH", source: other.source, message });
        continue;
      }

      if (!this.allowDateMismatch) {
        const message = `${primary.source} (${formatSnapDate(primary.snapDate)}) 與 ${other.source} (${formatSnapDate(other.snapDate)}) 的日期不一致`;
        logger.error({ event: "sources-disagree", diffSeconds }, message);
        return err({ type: "SOURCES_DISAGREE", filePath: item.filePath, message });
      }

      const message = `${primary.source} 與 ${other.source} 的日期不一致，依設定採用 ${primary.source}`;
      logger.warn({ event: "date-mismatch-ignored", diffSeconds }, message);
      warnings.push({ type: "DATE_MISMATCH_IGNORED", source: other.source, message });
    }

    logger.debug({
      source: primary.source,
    })`拍攝時間: ${formatSnapDate(primary.snapDate)}`;
    return ok(
      Object.freeze({
        snapDate: primary.snapDate,
        source: primary.source,
        warnings: Object.freeze(warnings),
      })
    );
  }

  /** 來源內部拋出的例外一律視為沒有證據 */
  private async lookup(
    source: TimestampSource,
    item: MediaItem,
    logger: Logger
  ): Promise<TimestampEvidence> {
    try {
      const evidence = await source.lookup(item, logger);
      if (evidence.ok) {
        logger.debug({
          source: source.name,
        })`${source.name} 取得時間 ${formatSnapDate(evidence.value)}`;
      } else {
        logger.debug({
          source: source.name,
          reason: evidence.error.type,
        })`${source.name} 沒有可用的時間: ${evidence.error.message}`;
      }
      return evidence;
    } catch (error) {
      logger.warn({
        source: source.name,
        error,
      })`${source.name} 讀取時發生例外，視為沒有證據`;
      return err({
        type: "NO_EVIDENCE",
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async fallbackOrFail(
    item: MediaItem,
    logger: Logger
  ): Promise<Result<ReconciledDate, ReconciliationFailure>> {
    const message = `無法判斷 ${item.filePath} 的拍攝時間`;
    if (!this.fallback) {
      return err({ type: "NO_EVIDENCE", filePath: item.filePath, message });
    }

    const evidence = await this.lookup(this.fallback, item, logger);
    if (!evidence.ok) {
      return err({ type: "NO_EVIDENCE", filePath: item.filePath, message });
    }

    const warning: ReconcileWarning = {
      type: "FILE_TIME_FALLBACK",
      source: this.fallback.name,
      message: `其他來源皆無結果，改用 ${this.fallback.name}`,
    };
    logger.warn({ event: "fallback" }, warning.message);
    return ok(
      Object.freeze({
        snapDate: evidence.value,
        source: this.fallback.name,
        warnings: Object.freeze([warning]),
      })
    );
  }
}
