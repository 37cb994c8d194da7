import { isExists } from "date-fns";

import { type Result, err, ok } from "~shared/utils/Result";

import type { SnapDate } from "@/types";

export type SnapDateParts = Partial<Record<keyof SnapDate, number>>;

export type SnapDateError = {
  type: "FORMAT_MISMATCH" | "MISSING_FIELD" | "OUT_OF_RANGE";
  message: string;
};

const EXIF_DATETIME_RE = /^(\d{4}):(\d{2}):(\d{2})\s+(\d{2}):(\d{2}):(\d{2})$/;
const ISO_DATETIME_RE = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z?$/;

/**
 * 建立 SnapDate。year/month/day 必填，時分秒缺少時為 0；
 * 任何不存在的日期或時間（如 2 月 30 日、24 時）皆回傳錯誤，不會產生部分填入的值。
 */
export function createSnapDate(
  parts: SnapDateParts
): Result<SnapDate, SnapDateError> {
  const { year, month, day, hour = 0, minute = 0, second = 0 } = parts;
  if (year === undefined || month === undefined || day === undefined) {
    return err({
      type: "MISSING_FIELD",
      message: `缺少必要欄位: ${JSON.stringify(parts)}`,
    });
  }

  const all = [year, month, day, hour, minute, second];
  const inRange =
    all.every(Number.isInteger) &&
    year >= 1 &&
    isExists(year, month - 1, day) &&
    hour >= 0 &&
    hour <= 23 &&
    minute >= 0 &&
    minute <= 59 &&
    second >= 0 &&
    second <= 59;
  if (!inRange) {
    return err({
      type: "OUT_OF_RANGE",
      message: `無效的日期時間: ${JSON.stringify(parts)}`,
    });
  }

  return ok(Object.freeze({ year, month, day, hour, minute, second }));
}

function fromMatch(
  match: RegExpExecArray | null,
  raw: string
): Result<SnapDate, SnapDateError> {
  if (!match) {
    return err({ type: "FORMAT_MISMATCH", message: `格式不符: ${raw}` });
  }
  const [, year, month, day, hour, minute, second] = match.map(Number);
  return createSnapDate({ year, month, day, hour, minute, second });
}

/** EXIF 格式 "YYYY:MM:DD HH:MM:SS" */
export function parseExifDateTime(raw: string) {
  return fromMatch(EXIF_DATETIME_RE.exec(raw.trim()), raw);
}

/** "YYYY-MM-DDTHH:MM:SS"，小數秒（及其後綴）會先被捨去 */
export function parseIsoDateTime(raw: string) {
  const withoutFraction = raw.trim().split(".")[0] ?? "";
  return fromMatch(ISO_DATETIME_RE.exec(withoutFraction), raw);
}

/** 以本地時間欄位轉換 */
export function snapDateFromDate(date: Date) {
  return createSnapDate({
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate(),
    hour: date.getHours(),
    minute: date.getMinutes(),
    second: date.getSeconds(),
  });
}

/** 以 UTC 表示同樣的牆上時間，只用於計算差距 */
export function toUtcDate(d: SnapDate) {
  return new Date(
    Date.UTC(d.year, d.month - 1, d.day, d.hour, d.minute, d.second)
  );
}

export function isSameSnapDate(a: SnapDate, b: SnapDate) {
  return isSameCalendarDay(a, b) && isSameTimeOfDay(a, b);
}

export function isSameCalendarDay(a: SnapDate, b: SnapDate) {
  return a.year === b.year && a.month === b.month && a.day === b.day;
}

function isSameTimeOfDay(a: SnapDate, b: SnapDate) {
  return a.hour === b.hour && a.minute === b.minute && a.second === b.second;
}

const pad2 = (n: number) => String(n).padStart(2, "0");

export function formatSnapDate(d: SnapDate) {
  return `${d.year}-${pad2(d.month)}-${pad2(d.day)} ${pad2(d.hour)}:${pad2(d.minute)}:${pad2(d.second)}`;
}
