export type MediaCategory = "image" | "video";

export type MediaItem = {
  readonly filePath: string;
  readonly fileName: string;
  /** 正規化後的副檔名，不含 "." */
  readonly extension: string;
  /** 不支援的副檔名為 undefined */
  readonly category: MediaCategory | undefined;
};

export type SnapDate = Readonly<{
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}>;
