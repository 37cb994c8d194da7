import { describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";

import {
  VideoProbeServiceFFprobe,
  extractCreationTime,
} from "@/services/VideoProbeService";

const probeOutput = (streams: unknown[]) => JSON.stringify({ streams });

describe("VideoProbeServiceFFprobe", () => {
  test("以 JSON 模式呼叫 ffprobe 並讀取第一條串流的 creation_time", async () => {
    const calls: { executable: string; args: string[] }[] = [];
    const service = new VideoProbeServiceFFprobe({
      ffprobePath: "/opt/ffprobe",
      runner: async (executable, args) => {
        calls.push({ executable, args });
        return probeOutput([
          { tags: { creation_time: "2024-03-05T14:30:45.000000Z" } },
          { tags: { creation_time: "1999-01-01T00:00:00.000000Z" } },
        ]);
      },
    });

    const result = await service.readCreationTime("/v/clip.mp4");
    expectOk(result);
    expect(result.value).toBe("2024-03-05T14:30:45.000000Z");
    expect(calls).toEqual([
      {
        executable: "/opt/ffprobe",
        args: [
          "-v",
          "quiet",
          "-print_format",
          "json",
          "-show_streams",
          "/v/clip.mp4",
        ],
      },
    ]);
  });

  test("ffprobe 執行失敗回傳 PROBE_FAILED", async () => {
    const service = new VideoProbeServiceFFprobe({
      runner: async () => {
        throw new Error("spawn ffprobe ENOENT");
      },
    });
    const result = await service.readCreationTime("/v/clip.mp4");
    expectErr(result);
    expect(result.error.type).toBe("PROBE_FAILED");
  });
});

describe("extractCreationTime", () => {
  test("非 JSON 輸出回傳 PARSE_FAILED", () => {
    const result = extractCreationTime("not json", "/v/a.mp4");
    expectErr(result);
    expect(result.error.type).toBe("PARSE_FAILED");
  });

  test("缺少 streams 回傳 PARSE_FAILED", () => {
    const result = extractCreationTime("{}", "/v/a.mp4");
    expectErr(result);
    expect(result.error.type).toBe("PARSE_FAILED");
  });

  test("沒有串流回傳 NO_CREATION_TIME", () => {
    const result = extractCreationTime(probeOutput([]), "/v/a.mp4");
    expectErr(result);
    expect(result.error.type).toBe("NO_CREATION_TIME");
  });

  test("第一條串流沒有 tags 時不會改讀第二條", () => {
    const result = extractCreationTime(
      probeOutput([
        { codec_type: "video" },
        { tags: { creation_time: "2024-03-05T14:30:45.000000Z" } },
      ]),
      "/v/a.mp4"
    );
    expectErr(result);
    expect(result.error.type).toBe("NO_CREATION_TIME");
  });
});
