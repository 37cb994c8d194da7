import type { Logger } from "~shared/Logger";
import { err, isErr, ok } from "~shared/utils/Result";

import { type ExifService, pickDateTag } from "@/services/ExifService";
import type { VideoProbeService } from "@/services/VideoProbeService";
import type { MediaItem } from "@/types";
import { parseExifDateTime, parseIsoDateTime } from "@/utils/snapDate";

import type { TimestampEvidence, TimestampSource } from "./TimestampSource";

/**
 * 依媒體類別擇一讀取：影像讀 EXIF 日期標籤，影片讀 ffprobe 的 creation_time。
 */
export class MetadataTimestampSource implements TimestampSource {
  readonly name = "metadata";
  private readonly exifService: ExifService;
  private readonly videoProbeService: VideoProbeService;

  constructor(deps: {
    exifService: ExifService;
    videoProbeService: VideoProbeService;
  }) {
    this.exifService = deps.exifService;
    this.videoProbeService = deps.videoProbeService;
  }

  async lookup(item: MediaItem, logger: Logger): Promise<TimestampEvidence> {
    switch (item.category) {
      case "image":
        return this.fromExif(item, logger);
      case "video":
        return this.fromVideo(item, logger);
      case undefined:
        return err({
          type: "UNSUPPORTED_TYPE",
          message: `不支援的副檔名: ${item.extension}`,
        });
    }
  }

  private async fromExif(
    item: MediaItem,
    logger: Logger
  ): Promise<TimestampEvidence> {
    const exif = await this.exifService.readDateTags(item.filePath);
    if (isErr(exif)) {
      return err({ type: "NO_EVIDENCE", message: exif.error.message });
    }

    const picked = pickDateTag(exif.value);
    if (!picked) {
      return err({ type: "NO_EVIDENCE", message: "沒有任何 EXIF 日期標籤" });
    }

    const parsed = parseExifDateTime(picked.raw);
    if (isErr(parsed)) {
      logger.warn({
        event: "malformed-exif",
        tag: picked.tag,
        raw: picked.raw,
      })`EXIF 中的日期無效 (${picked.raw})，略過`;
      return err({ type: "MALFORMED_EVIDENCE", message: parsed.error.message });
    }
    return ok(parsed.value);
  }

  private async fromVideo(
    item: MediaItem,
    logger: Logger
  ): Promise<TimestampEvidence> {
    const probe = await this.videoProbeService.readCreationTime(item.filePath);
    if (isErr(probe)) {
      logger.error({
        event: "probe-failed",
        error: probe.error,
      })`讀取影片 metadata 失敗: ${item.filePath}`;
      return err({ type: "NO_EVIDENCE", message: probe.error.message });
    }

    const parsed = parseIsoDateTime(probe.value);
    if (isErr(parsed)) {
      logger.warn({
        event: "malformed-video-metadata",
        raw: probe.value,
      })`影片 metadata 中的日期無效 (${probe.value})，略過`;
      return err({ type: "MALFORMED_EVIDENCE", message: parsed.error.message });
    }
    return ok(parsed.value);
  }
}
