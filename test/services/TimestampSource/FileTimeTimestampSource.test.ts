import { describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";
import { buildTestLogger } from "~shared/testkit/TestLogger";

import {
  type FileTimes,
  FileTimeTimestampSource,
} from "@/services/TimestampSource";
import { createMediaItem } from "@/utils/mediaItem";

import { sd } from "~test/helpers/sd";

function fakeStats(birthtime: Date, mtime: Date): FileTimes {
  return { birthtime, birthtimeMs: birthtime.getTime(), mtime };
}

describe("FileTimeTimestampSource", () => {
  const item = createMediaItem("/a/photo.jpg");

  test("優先使用建立時間", async () => {
    const source = new FileTimeTimestampSource(async () =>
      fakeStats(new Date(2024, 2, 5, 14, 30, 45), new Date(2024, 5, 1))
    );
    const result = await source.lookup(item, buildTestLogger());
    expectOk(result);
    expect(result.value).toEqual(sd(2024, 3, 5, 14, 30, 45));
  });

  test("沒有建立時間時改用修改時間", async () => {
    const source = new FileTimeTimestampSource(async () =>
      fakeStats(new Date(0), new Date(2024, 5, 1, 8, 0, 0))
    );
    const result = await source.lookup(item, buildTestLogger());
    expectOk(result);
    expect(result.value).toEqual(sd(2024, 6, 1, 8, 0, 0));
  });

  test("讀取失敗回傳 NO_EVIDENCE", async () => {
    const source = new FileTimeTimestampSource(async () => {
      throw new Error("ENOENT");
    });
    const result = await source.lookup(item, buildTestLogger());
    expectErr(result);
    expect(result.error.type).toBe("NO_EVIDENCE");
  });
});
