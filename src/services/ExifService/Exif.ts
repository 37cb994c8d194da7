/**
 * 影像中的日期標籤，依讀取優先序排列：
 * DateTime → DateTimeOriginal → DateTimeDigitized。
 * 值為原始字串，格式通常為 "YYYY:MM:DD HH:MM:SS"。
 */
export const exifDateTagPriority = [
  "DateTime",
  "DateTimeOriginal",
  "DateTimeDigitized",
] as const;

export type ExifDateTag = (typeof exifDateTagPriority)[number];

export type ExifDateTags = {
  /** 檔案完整路徑 */
  filePath: string;
  tags: Partial<Record<ExifDateTag, string>>;
};

export type ReadError =
  | { type: "FILE_NOT_FOUND"; message: string }
  | { type: "READ_FAILED"; message: string }
  | { type: "NO_EXIF_DATA"; message: string };
