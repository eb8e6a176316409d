import type { AutoCategory, FileCategory, FileKind } from "@/types";

export interface PathClassifier {
  /**
   * 由檔名推斷年份、類別與檔案種類。
   * 純函式，不讀取檔案系統。
   */
  classify(filename: string): Classification;
}

export type Classification = {
  /** 檔名中找不到日期時為 null，需由使用者補上 */
  year: number | null;
  category: FileCategory;
  kind: FileKind;
  /** 檔名含 YYYYMMDD_HHMMSS 時的拍攝時間 */
  capturedAt: Date | null;
};

/** 檔名（不分大小寫）同時包含所有 keywords 時歸入該類別 */
export type CategoryRule = {
  category: AutoCategory;
  keywords: string[];
};
