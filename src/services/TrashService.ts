import type { Result } from "~shared/utils/Result";

export type TrashError = {
  type: "SOURCE_MISSING" | "TRASH_FAILED";
  message: string;
};

/** 可復原的刪除：所有刪除動作都必須經過這裡，不直接 unlink */
export interface TrashService {
  /** 成功時回傳檔案在回收區中的新路徑 */
  moveToTrash(filePath: string): Promise<Result<string, TrashError>>;
}
