import { describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";
import { buildTestLogger } from "~shared/testkit/TestLogger";

import {
  FilenameTimestampSource,
  matchFirst,
} from "@/services/TimestampSource";
import { createMediaItem } from "@/utils/mediaItem";

import { sd } from "~test/helpers/sd";

async function lookup(fileName: string, source = new FilenameTimestampSource()) {
  const logger = buildTestLogger();
  const result = await source.lookup(
    createMediaItem(`/photos/${fileName}`),
    logger
  );
  return { result, logger };
}

describe("FilenameTimestampSource", () => {
  test.each([
    ["IMG_20240305_143045.jpg", sd(2024, 3, 5, 14, 30, 45)],
    ["VID_20240305_143000123.mp4", sd(2024, 3, 5, 14, 30, 0)],
    ["Screenshot_2024-03-05-14-30-45.png", sd(2024, 3, 5, 14, 30, 45)],
    ["2024-03-05 14.30.45.jpg", sd(2024, 3, 5, 14, 30, 45)],
    ["WhatsApp Image 2024-03-05 at 14.30.45.jpeg", sd(2024, 3, 5, 14, 30, 45)],
    ["IMG-20240305-WA0001.jpg", sd(2024, 3, 5)],
    ["trip_2024-03-05_beach.mp4", sd(2024, 3, 5)],
    ["2024-3-5-14h30m45s_IMG2.jpg", sd(2024, 3, 5, 14, 30, 45)],
    ["2024-12-25-9h5_VID1.mp4", sd(2024, 12, 25, 9, 5, 0)],
  ])("%s", async (fileName, expected) => {
    const { result } = await lookup(fileName);
    expectOk(result);
    expect(result.value).toEqual(expected);
  });

  test("不符合任何樣式回傳 NO_EVIDENCE 且沒有警告", async () => {
    const { result, logger } = await lookup("DSC_0001.JPG");
    expectErr(result);
    expect(result.error.type).toBe("NO_EVIDENCE");
    expect(logger.recordsAt("warn")).toHaveLength(0);
  });

  test("符合樣式但日期不存在時回傳 MALFORMED_EVIDENCE 並警告", async () => {
    const { result, logger } = await lookup("IMG_20241305_143000.jpg");
    expectErr(result);
    expect(result.error.type).toBe("MALFORMED_EVIDENCE");
    expect(logger.recordsAt("warn")).toHaveLength(1);
  });

  test("第一個符合的樣式即採用，即使後面的樣式更完整", async () => {
    const source = new FilenameTimestampSource([
      /(?<year>\d{4})-(?<month>\d{2})-(?<day>\d{2})/,
      /(?<year>\d{4})-(?<month>\d{2})-(?<day>\d{2}) (?<hour>\d{2})\.(?<minute>\d{2})/,
    ]);
    const { result } = await lookup("2024-03-05 14.30.jpg", source);
    expectOk(result);
    expect(result.value).toEqual(sd(2024, 3, 5));
  });

  test("樣式缺少年月日時視為無效", async () => {
    const source = new FilenameTimestampSource([
      /(?<hour>\d{2})h(?<minute>\d{2})/,
    ]);
    const { result } = await lookup("clip_14h30.mp4", source);
    expectErr(result);
    expect(result.error.type).toBe("MALFORMED_EVIDENCE");
  });
});

describe("matchFirst", () => {
  test("只帶入有比對到的欄位", () => {
    const match = matchFirst(
      [/(?<year>\d{4})(?<month>\d{2})(?<day>\d{2})(?:_(?<hour>\d{2}))?/],
      "20240305.jpg"
    );
    expect(match?.parts).toEqual({ year: 2024, month: 3, day: 5 });
  });

  test("都不符合時回傳 undefined", () => {
    expect(matchFirst([/\d{8}/], "abc.jpg")).toBeUndefined();
  });
});
