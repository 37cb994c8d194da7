import type { Result } from "~shared/utils/Result";

export type ProbeError =
  | { type: "PROBE_FAILED"; message: string }
  | { type: "PARSE_FAILED"; message: string }
  | { type: "NO_CREATION_TIME"; message: string };

export interface VideoProbeService {
  /**
   * 讀取第一條串流的 creation_time 標籤原始字串，
   * 例如 "2024-03-05T14:30:00.000000Z"。
   */
  readCreationTime(filePath: string): Promise<Result<string, ProbeError>>;
}
