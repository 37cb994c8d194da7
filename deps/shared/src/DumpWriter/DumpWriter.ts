export interface DumpWriter {
  /**
   * 將資料寫成 JSON 報告，回傳實際寫入的檔案路徑。
   */
  dump(name: string, data: unknown): Promise<string>;
}
