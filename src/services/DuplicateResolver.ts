import type {
  CategoryFolder,
  Conflict,
  FileEntry,
  OrganizedFolder,
  RedundantCopy,
} from "@/types";

export interface DuplicateResolver {
  /**
   * 比對待整理檔案與已整理資料夾。
   * 純函式：相同輸入永遠得到相同結果，不修改傳入的 entries。
   */
  resolve(input: ResolveInput): ResolveResult;
}

export type ResolveInput = {
  pending: FileEntry[];
  organizedFolders: OrganizedFolder[];
  categoryFolders: CategoryFolder[];
  ignoreList: ReadonlySet<string>;
};

export type ResolveResult = {
  entries: FileEntry[];
  /** 同一檔名出現在兩個以上的已整理資料夾，需使用者處理 */
  conflicts: Conflict[];
  /** 在忽略清單中的衝突，只在要求時顯示 */
  ignoredConflicts: Conflict[];
  redundantCategoryCopies: RedundantCopy[];
};
