import type { SnapDate } from "@/types";

/** 測試用：直接建立 SnapDate，不經驗證 */
export function sd(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0
): SnapDate {
  return { year, month, day, hour, minute, second };
}
