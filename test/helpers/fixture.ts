import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

import type { FileEntry, FolderRef, OrganizedFolder } from "@/types";

/** 建立測試用暫存資料夾，回傳路徑與清除函式 */
export async function createTempDir(name: string) {
  const dir = await mkdtemp(join(tmpdir(), `camera-organizer-${name}-`));
  return {
    dir,
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}

/** 建立檔案（含上層資料夾），內容預設為相對路徑，方便確認搬移後的檔案 */
export async function touch(root: string, relative: string, content?: string) {
  const target = join(root, ...relative.split("/"));
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, content ?? relative);
  return target;
}

export function buildEntry(
  identity: string,
  overrides: Partial<FileEntry> = {}
): FileEntry {
  return {
    identity,
    sourcePath: `/camera/${identity}`,
    kind: "image",
    year: 2024,
    yearSource: "filename",
    capturedAt: null,
    category: "normal",
    assignedFolder: null,
    state: "pending-assignment",
    ...overrides,
  };
}

export function buildFolder(
  year: number,
  name: string,
  members: string[]
): OrganizedFolder {
  return {
    year,
    name,
    path: `/camera/${year}/${name}`,
    colorTag: "#000000",
    memberIdentities: members,
  };
}

export function refOf({ year, name, path }: FolderRef): FolderRef {
  return { year, name, path };
}
