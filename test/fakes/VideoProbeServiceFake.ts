import { type Result, err, ok } from "~shared/utils/Result";

import type {
  ProbeError,
  VideoProbeService,
} from "@/services/VideoProbeService";

export class VideoProbeServiceFake implements VideoProbeService {
  private readonly records: Map<string, Result<string, ProbeError>> =
    new Map();
  readonly calls: string[] = [];

  async readCreationTime(filePath: string): Promise<Result<string, ProbeError>> {
    this.calls.push(filePath);
    return (
      this.records.get(filePath) ??
      err({ type: "PROBE_FAILED", message: `No such file: ${filePath}` })
    );
  }

  setCreationTime(filePath: string, creationTime: string) {
    this.records.set(filePath, ok(creationTime));
  }

  setProbeError(filePath: string, error: ProbeError) {
    this.records.set(filePath, err(error));
  }
}
