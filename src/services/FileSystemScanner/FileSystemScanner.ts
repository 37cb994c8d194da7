import type { Result } from "~shared/utils/Result";

export type ScanError = {
  type: "SCAN_FAILED";
  message: string;
};

export type ScanOptions = {
  /** 預設為 true */
  recursive?: boolean;
  /** 副檔名白名單（不分大小寫，可帶或不帶 "."），空陣列表示不過濾 */
  allowExts?: readonly string[];
};

export interface FileSystemScanner {
  /**
   * 逐一產生檔案路徑，每個資料夾內依名稱排序，子資料夾在走到時才讀取。
   */
  walk(rootPath: string, options?: ScanOptions): AsyncGenerator<string>;

  scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<string[], ScanError>>;
}
