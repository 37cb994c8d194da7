import type { Result } from "~shared/utils/Result";

import type { ExifDateTags, ReadError } from "./Exif";

export interface ExifService {
  /**
   * 讀取影像的日期標籤。
   * 成功時回傳原始字串（不解析），失敗時包含具體錯誤原因。
   */
  readDateTags(filePath: string): Promise<Result<ExifDateTags, ReadError>>;
}
