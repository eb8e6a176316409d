import type { Result } from "~shared/utils/Result";

import type {
  Assignment,
  FileEntry,
  MoveReason,
  Plan,
  PlanIssue,
  TrashReason,
} from "@/types";

export type PlacementTarget =
  | { kind: "move"; relativeTo: string; reason: MoveReason }
  | { kind: "trash"; reason: TrashReason };

export interface PlacementPlanner {
  /** 計算單一檔案的目標位置（相對於相機資料夾），不處理碰撞 */
  plan(
    entry: FileEntry,
    assignment: Assignment
  ): Result<PlacementTarget, PlanIssue>;

  /**
   * 產生整批搬移計畫。
   * 與 occupied（已存在的相對路徑）或同批前面的目標撞名時，在副檔名前加上 `_1`、`_2`…
   * 不碰檔案系統，可先預覽再執行。
   */
  planBatch(input: PlanBatchInput): Plan;
}

export type PlanBatchInput = {
  root: string;
  entries: FileEntry[];
  occupied: Iterable<string>;
};
