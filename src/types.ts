export type FileKind = "image" | "video" | "other";

export type FileCategory = "normal" | "screenshot" | "screen-recording";

export type AutoCategory = Exclude<FileCategory, "normal">;

/**
 * - unorganized: 無法判斷年份，需使用者輸入
 * - pending-assignment: 已有年份，尚未指定資料夾
 * - planned: 年份與資料夾皆已確定
 * - duplicate: 已整理的資料夾中有同名檔案
 */
export type EntryState =
  | "unorganized"
  | "pending-assignment"
  | "planned"
  | "applied"
  | "duplicate";

export type YearSource = "filename" | "exif" | "user";

export type DuplicateAction = "relocate" | "trash";

export type FolderRef = {
  year: number;
  name: string;
  path: string;
};

export type FileEntry = {
  /** 檔名（區分大小寫），作為重複與碰撞判斷的 key */
  identity: string;
  sourcePath: string;
  kind: FileKind;
  year: number | null;
  yearSource: YearSource | null;
  capturedAt: Date | null;
  category: FileCategory;
  assignedFolder: string | null;
  state: EntryState;
  duplicateAction?: DuplicateAction;
  duplicateOf?: FolderRef[];
};

export type OrganizedFolder = FolderRef & {
  colorTag: string;
  memberIdentities: string[];
};

export type CategoryFolder = FolderRef & {
  category: AutoCategory;
  memberIdentities: string[];
};

export type Conflict = {
  identity: string;
  folders: FolderRef[];
};

/** 同時存在於截圖類資料夾與一般資料夾的檔案，截圖類那份為多餘副本 */
export type RedundantCopy = {
  identity: string;
  path: string;
  keptIn: FolderRef[];
};

export type ScanWarning = {
  path: string;
  message: string;
};

export type Inventory = {
  root: string;
  scannedAt: Date;
  pending: FileEntry[];
  organizedFolders: OrganizedFolder[];
  categoryFolders: CategoryFolder[];
  /** 已在 `!duplicate/` 中的檔名 */
  duplicateArea: string[];
  conflicts: Conflict[];
  ignoredConflicts: Conflict[];
  redundantCategoryCopies: RedundantCopy[];
  warnings: ScanWarning[];
};

export type Assignment = {
  year: number | null;
  folder: string | null;
};

export type MoveReason = "organize" | "auto-category" | "duplicate";

export type PlannedMove = {
  identity: string;
  from: string;
  to: string;
  /** 相對於相機資料夾的目標路徑，以 `/` 分隔 */
  relativeTo: string;
  reason: MoveReason;
  renamed: boolean;
};

export type TrashReason =
  | "duplicate-screenshot"
  | "user-delete"
  | "redundant-copy";

export type PlannedTrash = {
  identity: string;
  from: string;
  reason: TrashReason;
};

export type PlanIssueType =
  | "NO_YEAR"
  | "NO_FOLDER"
  | "INVALID_FOLDER_NAME"
  | "COLLISION_UNRESOLVED";

export type PlanIssue = {
  identity: string;
  type: PlanIssueType;
  message: string;
};

export type Plan = {
  moves: PlannedMove[];
  trashes: PlannedTrash[];
  issues: PlanIssue[];
};
