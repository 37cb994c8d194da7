import { ExifDate, ExifDateTime } from "exiftool-vendored";

import { type ExifDateTag, type ExifDateTags, exifDateTagPriority } from "./Exif";

/**
 * 取出 exiftool 標籤的原始字串。
 * ExifDateTime 優先使用 rawValue，避免時區換算改變牆上時間。
 */
export function rawExifValue(value: unknown): string | undefined {
  if (typeof value === "string") return value.trim() || undefined;
  if (value instanceof ExifDateTime) {
    return value.rawValue ?? value.toExifString();
  }
  if (value instanceof ExifDate) {
    return value.rawValue ?? value.toExifString();
  }
  return undefined;
}

/** 依優先序取第一個存在的日期標籤 */
export function pickDateTag(
  exif: ExifDateTags
): { tag: ExifDateTag; raw: string } | undefined {
  for (const tag of exifDateTagPriority) {
    const raw = exif.tags[tag];
    if (raw !== undefined) return { tag, raw };
  }
  return undefined;
}
