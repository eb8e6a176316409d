import { constants } from "node:fs";
import { copyFile, rename, stat, unlink } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { stdin as input, stdout as output } from "node:process";
import { createInterface } from "node:readline/promises";

export function expandHome(p: string) {
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

export async function confirm(question: string) {
  const rl = createInterface({ input, output });
  const ans = (await rl.question(question)).trim().toLowerCase();
  rl.close();
  return ans === "y" || ans === "yes";
}

export async function exists(p: string) {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

/** rename 失敗於跨磁碟 (EXDEV) 時改以複製後刪除 */
export async function moveFile(from: string, to: string) {
  try {
    await rename(from, to);
  } catch (e) {
    if (!isErrnoException(e) || e.code !== "EXDEV") throw e;
    await copyThenUnlink(from, to);
  }
}

/** 目標已存在時以 EEXIST 失敗，不覆寫 */
export async function copyThenUnlink(from: string, to: string) {
  await copyFile(from, to, constants.COPYFILE_EXCL);
  await unlink(from);
}

export function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

/** IMG_001.jpg, 2 → IMG_001_2.jpg */
export function withNumericSuffix(filename: string, n: number) {
  const ext = path.extname(filename);
  const stem = filename.slice(0, filename.length - ext.length);
  return `${stem}_${n}${ext}`;
}

export function toPosixRelative(root: string, target: string) {
  return path.relative(root, target).split(path.sep).join("/");
}

export function errorMessage(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}
