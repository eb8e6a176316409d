import path from "node:path";

import { type Result, err, isErr, ok } from "~shared/utils/Result";

import {
  duplicateFolderName,
  maxCollisionAttempts,
  reservedPrefix,
  screenRecorderFolderPrefix,
  screenshotFolderPrefix,
} from "@/constants";
import type {
  Assignment,
  FileEntry,
  Inventory,
  Plan,
  PlanIssue,
} from "@/types";
import { toPosixRelative, withNumericSuffix } from "@/utils/helper";

import type {
  PlacementPlanner,
  PlacementTarget,
  PlanBatchInput,
} from "./PlacementPlanner";

export function validateFolderName(name: string): string | null {
  const trimmed = name.trim();
  if (trimmed.length === 0) return "資料夾名稱不可為空";
  if (trimmed === "." || trimmed === "..") return `不合法的資料夾名稱: ${name}`;
  if (/[/\\\0]/.test(trimmed)) return `資料夾名稱不可包含路徑分隔字元: ${name}`;
  if (trimmed.startsWith(reservedPrefix)) {
    return `以 ${reservedPrefix} 開頭的資料夾保留給系統使用: ${name}`;
  }
  return null;
}

/** 從 relativeTo 開始找第一個不在 taken 內的名稱，超過上限回傳 null */
export function nextFreeName(
  relativeTo: string,
  isTaken: (relative: string) => boolean
): string | null {
  if (!isTaken(relativeTo)) return relativeTo;
  const dir = path.posix.dirname(relativeTo);
  const base = path.posix.basename(relativeTo);
  for (let n = 1; n <= maxCollisionAttempts; n++) {
    const candidate = path.posix.join(dir, withNumericSuffix(base, n));
    if (!isTaken(candidate)) return candidate;
  }
  return null;
}

/** 掃描結果中已被佔用的相對路徑 */
export function occupiedPathsOf(inventory: Inventory): string[] {
  const occupied: string[] = [];
  for (const folder of [
    ...inventory.organizedFolders,
    ...inventory.categoryFolders,
  ]) {
    const dir = toPosixRelative(inventory.root, folder.path);
    for (const identity of folder.memberIdentities) {
      occupied.push(`${dir}/${identity}`);
    }
  }
  for (const identity of inventory.duplicateArea) {
    occupied.push(`${duplicateFolderName}/${identity}`);
  }
  return occupied;
}

export class PlacementPlannerDefault implements PlacementPlanner {
  plan(
    entry: FileEntry,
    assignment: Assignment
  ): Result<PlacementTarget, PlanIssue> {
    const issue = (type: PlanIssue["type"], message: string) =>
      err({ identity: entry.identity, type, message });

    if (entry.state === "duplicate") {
      if (entry.duplicateAction === "trash") {
        return ok<PlacementTarget>({
          kind: "trash",
          reason: "duplicate-screenshot",
        });
      }
      return ok<PlacementTarget>({
        kind: "move",
        relativeTo: `${duplicateFolderName}/${entry.identity}`,
        reason: "duplicate",
      });
    }

    const { year } = assignment;
    if (year === null) {
      return issue("NO_YEAR", `無法判斷年份，請手動輸入: ${entry.identity}`);
    }
    if (entry.category === "screenshot") {
      return ok<PlacementTarget>({
        kind: "move",
        relativeTo: `${year}/${screenshotFolderPrefix}${year}/${entry.identity}`,
        reason: "auto-category",
      });
    }
    if (entry.category === "screen-recording") {
      return ok<PlacementTarget>({
        kind: "move",
        relativeTo: `${year}/${screenRecorderFolderPrefix}${year}/${entry.identity}`,
        reason: "auto-category",
      });
    }

    if (!assignment.folder) {
      return issue("NO_FOLDER", `尚未指定資料夾: ${entry.identity}`);
    }
    const invalid = validateFolderName(assignment.folder);
    if (invalid) return issue("INVALID_FOLDER_NAME", invalid);

    return ok<PlacementTarget>({
      kind: "move",
      relativeTo: `${year}/${assignment.folder.trim()}/${entry.identity}`,
      reason: "organize",
    });
  }

  planBatch({ root, entries, occupied }: PlanBatchInput): Plan {
    const taken = new Set(occupied);
    const result: Plan = { moves: [], trashes: [], issues: [] };

    for (const entry of entries) {
      const target = this.plan(entry, {
        year: entry.year,
        folder: entry.assignedFolder,
      });
      if (isErr(target)) {
        result.issues.push(target.error);
        continue;
      }
      if (target.value.kind === "trash") {
        result.trashes.push({
          identity: entry.identity,
          from: entry.sourcePath,
          reason: target.value.reason,
        });
        continue;
      }

      const wanted = target.value.relativeTo;
      const free = nextFreeName(wanted, (p) => taken.has(p));
      if (free === null) {
        result.issues.push({
          identity: entry.identity,
          type: "COLLISION_UNRESOLVED",
          message: `找不到可用的檔名: ${wanted}`,
        });
        continue;
      }
      taken.add(free);
      result.moves.push({
        identity: entry.identity,
        from: entry.sourcePath,
        to: path.join(root, ...free.split("/")),
        relativeTo: free,
        reason: target.value.reason,
        renamed: free !== wanted,
      });
    }

    return result;
  }
}
