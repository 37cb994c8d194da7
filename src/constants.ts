export const imageExtensions = [
  ".jpg",
  ".jpeg",
  ".png",
  ".tif",
  ".tiff",
  ".heic",
  ".heif",
  ".webp",
  ".gif",
] as const;

export const videoExtensions = [
  ".mp4",
  ".mov",
  ".m4v",
  ".3gp",
  ".avi",
  ".mkv",
  ".webm",
  ".mts",
] as const;

export const supportedExtensions = [
  ...imageExtensions,
  ...videoExtensions,
] as const;

/** 正規化後的副檔名：jpeg → jpg、tiff → tif，其餘維持小寫原樣 */
export const extensionAliases: Readonly<Record<string, string>> = {
  jpeg: "jpg",
  tiff: "tif",
};

/**
 * 檔名日期樣式，依序比對，第一個符合者即採用（不論比對品質）。
 * 具名群組：year, month, day, hour, minute, second，缺少的欄位不帶入。
 */
export const filenameDatePatterns: readonly RegExp[] = [
  // 本工具的輸出格式：2024-3-5-14h30m45s_IMG1.jpg
  /^(?<year>\d{4})-(?<month>\d{1,2})-(?<day>\d{1,2})-(?<hour>\d{1,2})h(?<minute>\d{1,2})(?:m(?<second>\d{1,2})s)?_(?:IMG|VID)\d+/,
  // IMG_20240305_143000.jpg、VID_20240305_143000123.mp4、PXL_20240305_143000123.jpg
  /(?<year>\d{4})(?<month>\d{2})(?<day>\d{2})_(?<hour>\d{2})(?<minute>\d{2})(?<second>\d{2})/,
  // Screenshot_2024-03-05-14-30-00.png、2024-03-05 14.30.00.jpg
  /(?<year>\d{4})-(?<month>\d{2})-(?<day>\d{2})[ _-](?<hour>\d{2})[.:h-](?<minute>\d{2})(?:[.:m-](?<second>\d{2}))?/,
  // WhatsApp Image 2024-03-05 at 14.30.00.jpeg
  /(?<year>\d{4})-(?<month>\d{2})-(?<day>\d{2}) at (?<hour>\d{2})\.(?<minute>\d{2})\.(?<second>\d{2})/,
  // IMG-20240305-WA0001.jpg
  /(?<year>\d{4})(?<month>\d{2})(?<day>\d{2})-WA\d+/,
  // 只有日期：2024-03-05.jpg、trip_2024-03-05_beach.mp4
  /(?<year>\d{4})-(?<month>\d{2})-(?<day>\d{2})/,
];
