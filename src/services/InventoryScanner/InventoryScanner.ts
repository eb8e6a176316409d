import type { Result } from "~shared/utils/Result";

import type { Inventory } from "@/types";

export type ScanError = {
  type: "ROOT_NOT_FOUND" | "ROOT_NOT_DIRECTORY" | "SCAN_FAILED";
  message: string;
};

export type ScanOptions = {
  ignoreList?: ReadonlySet<string>;
  /** 檔名沒有年份時，改讀 EXIF 拍攝時間 */
  exifFallback?: boolean;
};

export interface InventoryScanner {
  /**
   * 掃描相機資料夾（根目錄、YEAR/、YEAR/FOLDER/ 三層），
   * 回傳完整的快照並附上重複與衝突標記。
   * 無法讀取的子資料夾只記錄 warning；根目錄不存在則回傳錯誤。
   */
  scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<Inventory, ScanError>>;
}
