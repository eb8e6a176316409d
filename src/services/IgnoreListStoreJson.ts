import { Type as t } from "@sinclair/typebox";

import { type Result, isErr, ok } from "~shared/utils/Result";

import type { IgnoreListStore } from "./IgnoreListStore";
import {
  JsonDocumentStore,
  type StoreReadError,
  type StoreWriteError,
} from "./JsonDocumentStore";

const ignoreListSchema = t.Array(t.String());

export class IgnoreListStoreJson implements IgnoreListStore {
  private readonly document: JsonDocumentStore<typeof ignoreListSchema>;

  constructor(filePath: string) {
    this.document = new JsonDocumentStore(filePath, ignoreListSchema, () => []);
  }

  async load(): Promise<Result<Set<string>, StoreReadError>> {
    const result = await this.document.read();
    if (isErr(result)) return result;
    return ok(new Set(result.value));
  }

  async save(
    ignoreList: ReadonlySet<string>
  ): Promise<Result<null, StoreWriteError>> {
    return this.document.write(
      [...ignoreList].sort((a, b) => a.localeCompare(b))
    );
  }
}
