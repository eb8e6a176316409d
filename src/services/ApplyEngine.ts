import type { Plan } from "@/types";

export type ApplyStatus = "success" | "skipped" | "failed";

export type ApplyFailureReason =
  | "SOURCE_MISSING"
  | "COLLISION_UNRESOLVED"
  | "MOVE_FAILED"
  | "TRASH_FAILED";

export type ApplyEntryResult = {
  identity: string;
  action: "move" | "trash";
  status: ApplyStatus;
  from: string;
  /** 實際寫入的位置（搬移的目標或回收區中的路徑） */
  to?: string;
  /** 執行時發現目標已存在而改名 */
  renamed?: boolean;
  reason?: ApplyFailureReason;
  message?: string;
};

export type ApplySummary = {
  succeeded: number;
  skipped: number;
  failed: number;
};

export type ApplyReport = {
  results: ApplyEntryResult[];
  summary: ApplySummary;
  /** 編輯紀錄更新失敗時的訊息；檔案本身已搬移完成 */
  sessionWarning?: string;
};

export interface ApplyEngine {
  /**
   * 逐一執行搬移與刪除。
   * 單一檔案失敗不會中止整批；成功的檔案會從編輯紀錄中移除。
   */
  apply(plan: Pick<Plan, "moves" | "trashes">): Promise<ApplyReport>;
}
