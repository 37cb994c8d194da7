import { err, ok } from "~shared/utils/Result";

import type {
  EvidenceError,
  TimestampEvidence,
  TimestampSource,
} from "@/services/TimestampSource";
import type { MediaItem, SnapDate } from "@/types";

/** 依檔案路徑回傳預先設定的證據，未設定者為 NO_EVIDENCE */
export class TimestampSourceFake implements TimestampSource {
  private readonly evidence = new Map<string, TimestampEvidence | Error>();
  readonly calls: string[] = [];

  constructor(readonly name: string) {}

  async lookup(item: MediaItem): Promise<TimestampEvidence> {
    this.calls.push(item.filePath);
    const found = this.evidence.get(item.filePath);
    if (found instanceof Error) throw found;
    return found ?? err({ type: "NO_EVIDENCE", message: "not set" });
  }

  setDate(filePath: string, snapDate: SnapDate) {
    this.evidence.set(filePath, ok(snapDate));
    return this;
  }

  setError(filePath: string, error: EvidenceError) {
    this.evidence.set(filePath, err(error));
    return this;
  }

  setThrow(filePath: string, error: Error) {
    this.evidence.set(filePath, error);
    return this;
  }
}
