import type { Logger } from "~shared/Logger";

import type { ApplyReport } from "@/services/ApplyEngine";
import type { EntryState, FileEntry, Inventory, Plan } from "@/types";
import { toPosixRelative } from "@/utils/helper";

/** 依狀態分組的清單，供 dump 輸出 */
export function inventoryReport(inventory: Inventory) {
  const byState: Partial<Record<EntryState, string[]>> = {};
  for (const entry of inventory.pending) {
    (byState[entry.state] ??= []).push(describeEntry(entry));
  }
  return {
    root: inventory.root,
    scannedAt: inventory.scannedAt.toISOString(),
    summary: {
      pending: inventory.pending.length,
      organizedFolders: inventory.organizedFolders.length,
      categoryFolders: inventory.categoryFolders.length,
      duplicateArea: inventory.duplicateArea.length,
      conflicts: inventory.conflicts.length,
      ignoredConflicts: inventory.ignoredConflicts.length,
      redundantCategoryCopies: inventory.redundantCategoryCopies.length,
      warnings: inventory.warnings.length,
    },
    byState,
    folders: inventory.organizedFolders.map((f) => ({
      folder: `${f.year}/${f.name}`,
      colorTag: f.colorTag,
      files: f.memberIdentities.length,
    })),
    warnings: inventory.warnings,
  };
}

function describeEntry(entry: FileEntry) {
  const year = entry.year ?? "?";
  const folder = entry.assignedFolder ?? "-";
  const dup = entry.duplicateOf?.length
    ? ` ⇄ ${entry.duplicateOf.map((f) => `${f.year}/${f.name}`).join(", ")}`
    : "";
  return `${entry.identity} [${year} / ${folder}]${dup}`;
}

export function planReport(root: string, plan: Plan) {
  return {
    summary: {
      moves: plan.moves.length,
      trashes: plan.trashes.length,
      issues: plan.issues.length,
    },
    moves: plan.moves.map(
      (m) => `${m.identity} → ${m.relativeTo}${m.renamed ? " (改名)" : ""}`
    ),
    trashes: plan.trashes.map(
      (t) => `${toPosixRelative(root, t.from)} (${t.reason})`
    ),
    issues: plan.issues.map((i) => `${i.identity}: ${i.type} ${i.message}`),
  };
}

export function logApplyReport(logger: Logger, report: ApplyReport) {
  const { succeeded, skipped, failed } = report.summary;
  for (const result of report.results) {
    if (result.status === "failed") {
      logger.warn({
        emoji: "🧨",
        reason: result.reason,
      })`${result.identity} 失敗: ${result.message ?? ""}`;
    }
  }
  if (failed > 0) {
    logger.warn({
      emoji: "⚠️",
      succeeded,
      skipped,
      failed,
    })`完成 ${succeeded} 個，略過 ${skipped} 個，失敗 ${failed} 個`;
  } else {
    logger.info({
      emoji: "✅",
      succeeded,
      skipped,
    })`完成 ${succeeded} 個，略過 ${skipped} 個`;
  }
}
