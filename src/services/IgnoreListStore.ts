import type { Result } from "~shared/utils/Result";

import type { StoreReadError, StoreWriteError } from "./JsonDocumentStore";

/** 使用者確認過、不再回報的重複檔名 */
export interface IgnoreListStore {
  load(): Promise<Result<Set<string>, StoreReadError>>;
  save(ignoreList: ReadonlySet<string>): Promise<Result<null, StoreWriteError>>;
}
