import type { EntryState, FileEntry } from "@/types";

/** 依年份、類別與指定資料夾重新計算狀態；重複相關狀態由 DuplicateResolver 決定 */
export function deriveState(
  entry: Pick<FileEntry, "state" | "year" | "category" | "assignedFolder">
): EntryState {
  if (entry.state === "duplicate") return entry.state;
  if (entry.year === null) return "unorganized";
  if (entry.category !== "normal") return "planned";
  return entry.assignedFolder ? "planned" : "pending-assignment";
}
