import type { Result } from "~shared/utils/Result";

import type { FileCategory } from "@/types";

import type { StoreReadError, StoreWriteError } from "./JsonDocumentStore";

/** 使用者尚未套用的決定；category 為 null 表示沿用檔名判斷 */
export type EditRecord = {
  year: number | null;
  folder: string | null;
  category: FileCategory | null;
};

export type EditSession = Map<string, EditRecord>;

export interface EditSessionStore {
  load(): Promise<Result<EditSession, StoreReadError>>;
  /** 整份覆寫 */
  save(session: EditSession): Promise<Result<null, StoreWriteError>>;
}
