import { Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { execFile } from "node:child_process";
import { promisify } from "node:util";

import { type Result, err, ok } from "~shared/utils/Result";

import type { ProbeError, VideoProbeService } from "./VideoProbeService";

const execFileAsync = promisify(execFile);

const ffprobeOutputSchema = t.Object({
  streams: t.Array(
    t.Object({
      tags: t.Optional(t.Record(t.String(), t.Unknown())),
    })
  ),
});

/** 執行 ffprobe 並回傳 stdout */
export type FFprobeRunner = (
  executable: string,
  args: string[]
) => Promise<string>;

const defaultRunner: FFprobeRunner = async (executable, args) => {
  const { stdout } = await execFileAsync(executable, args, {
    maxBuffer: 16 * 1024 * 1024,
  });
  return stdout;
};

export class VideoProbeServiceFFprobe implements VideoProbeService {
  private readonly ffprobePath: string;
  private readonly run: FFprobeRunner;

  constructor(deps: { ffprobePath?: string; runner?: FFprobeRunner } = {}) {
    this.ffprobePath = deps.ffprobePath ?? "ffprobe";
    this.run = deps.runner ?? defaultRunner;
  }

  async readCreationTime(filePath: string): Promise<Result<string, ProbeError>> {
    let stdout: string;
    try {
      stdout = await this.run(this.ffprobePath, [
        "-v",
        "quiet",
        "-print_format",
        "json",
        "-show_streams",
        filePath,
      ]);
    } catch (e) {
      return err({
        type: "PROBE_FAILED",
        message: `ffprobe 執行失敗: ${filePath} (${e instanceof Error ? e.message : String(e)})`,
      });
    }
    return extractCreationTime(stdout, filePath);
  }
}

export function extractCreationTime(
  stdout: string,
  filePath: string
): Result<string, ProbeError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch {
    return err({
      type: "PARSE_FAILED",
      message: `ffprobe 輸出不是合法 JSON: ${filePath}`,
    });
  }
  if (!Value.Check(ffprobeOutputSchema, parsed)) {
    return err({
      type: "PARSE_FAILED",
      message: `ffprobe 輸出缺少 streams: ${filePath}`,
    });
  }

  const creationTime = parsed.streams[0]?.tags?.creation_time;
  if (typeof creationTime !== "string") {
    return err({
      type: "NO_CREATION_TIME",
      message: `第一條串流沒有 creation_time: ${filePath}`,
    });
  }
  return ok(creationTime);
}
