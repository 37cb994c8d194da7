import { constants } from "node:fs";
import { copyFile, rename, rm, stat } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { stdin as input, stdout as output } from "node:process";
import { createInterface } from "node:readline/promises";

export function expandHome(p: string) {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

export async function confirm(question: string) {
  const rl = createInterface({ input, output });
  try {
    const ans = (await rl.question(question)).trim().toLowerCase();
    return ans === "y" || ans === "yes";
  } finally {
    rl.close();
  }
}

export async function exists(p: string) {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * 搬移檔案，跨裝置（EXDEV）時改為複製後刪除來源。
 * 目標已存在時由 COPYFILE_EXCL 拒絕覆蓋。
 */
export async function moveFile(from: string, to: string) {
  try {
    await rename(from, to);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== "EXDEV") throw error;
    await copyFile(from, to, constants.COPYFILE_EXCL);
    await rm(from);
  }
}

export async function copyFileExclusive(from: string, to: string) {
  await copyFile(from, to, constants.COPYFILE_EXCL);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
