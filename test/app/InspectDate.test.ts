import { describe, expect, test } from "vitest";

import { buildTestLogger } from "~shared/testkit/TestLogger";

import { inspectDates } from "@/app/InspectDate";

import { TimestampSourceFake } from "~test/fakes/TimestampSourceFake";
import { sd } from "~test/helpers/sd";

describe("inspectDates", () => {
  test("每個來源對每個檔案只查詢一次", async () => {
    const metadata = new TimestampSourceFake("metadata").setDate(
      "/in/a.jpg",
      sd(2024, 3, 5, 14, 30)
    );
    const filename = new TimestampSourceFake("filename").setDate(
      "/in/a.jpg",
      sd(2024, 3, 5, 14, 30)
    );
    const logger = buildTestLogger();

    const reports = await inspectDates(["/in/a.jpg", "/in/b.jpg"], {
      logger,
      sources: [metadata, filename],
    });

    expect(metadata.calls).toEqual(["/in/a.jpg", "/in/b.jpg"]);
    expect(filename.calls).toEqual(["/in/a.jpg", "/in/b.jpg"]);
    expect(reports.map((r) => r.result.ok)).toEqual([true, false]);
    expect(logger.recordsAt("info").map((r) => r.msg)).toEqual([
      "metadata: 2024-03-05 14:30:00",
      "filename: 2024-03-05 14:30:00",
      "/in/a.jpg → 2024-03-05 14:30:00",
      "metadata: NO_EVIDENCE not set",
      "filename: NO_EVIDENCE not set",
    ]);
  });

  test("來源拋出例外時仍完成判定並標示該來源", async () => {
    const metadata = new TimestampSourceFake("metadata").setThrow(
      "/in/a.jpg",
      new Error("boom")
    );
    const filename = new TimestampSourceFake("filename").setDate(
      "/in/a.jpg",
      sd(2024, 3, 5)
    );
    const logger = buildTestLogger();

    const [report] = await inspectDates(["/in/a.jpg"], {
      logger,
      sources: [metadata, filename],
    });

    expect(report?.evidence.has("metadata")).toBe(false);
    expect(report?.evidence.get("filename")?.ok).toBe(true);
    expect(report?.result.ok).toBe(true);
    expect(logger.recordsAt("info").map((r) => r.msg)).toContain(
      "metadata: 讀取時發生例外"
    );
  });
});
