import { type ExifTool, exiftool } from "exiftool-vendored";

import { type Result, err, ok } from "~shared/utils/Result";

import type { ExifDateTags, ReadError } from "./Exif";
import { rawExifValue } from "./ExifDateTimeHelper";
import type { ExifService } from "./ExifService";

export class ExifServiceExifTool implements ExifService {
  constructor(private readonly tool: ExifTool = exiftool) {}

  async readDateTags(
    filePath: string
  ): Promise<Result<ExifDateTags, ReadError>> {
    try {
      const tags = await this.tool.read(filePath);
      if (!tags) {
        return err({
          type: "NO_EXIF_DATA",
          message: `無 EXIF 資料: ${filePath}`,
        });
      }

      // exiftool 的 ModifyDate / CreateDate 即 EXIF 的 DateTime / DateTimeDigitized
      const dateTags: ExifDateTags["tags"] = {};
      const dateTime = rawExifValue(tags.ModifyDate);
      const original = rawExifValue(tags.DateTimeOriginal);
      const digitized = rawExifValue(tags.CreateDate);
      if (dateTime) dateTags.DateTime = dateTime;
      if (original) dateTags.DateTimeOriginal = original;
      if (digitized) dateTags.DateTimeDigitized = digitized;

      return ok({ filePath, tags: dateTags });
    } catch (e) {
      return err({
        type: "READ_FAILED",
        message: `讀取 EXIF 失敗: ${filePath} (${e instanceof Error ? e.message : String(e)})`,
      });
    }
  }

  async [Symbol.asyncDispose]() {
    await this.tool.end();
  }
}
