import { Type as t } from "@sinclair/typebox";

import { type Result, isErr, ok } from "~shared/utils/Result";

import type {
  EditRecord,
  EditSession,
  EditSessionStore,
} from "./EditSessionStore";
import {
  JsonDocumentStore,
  type StoreReadError,
  type StoreWriteError,
} from "./JsonDocumentStore";

const editRecordSchema = t.Object({
  year: t.Union([t.Integer(), t.Null()]),
  folder: t.Union([t.String(), t.Null()]),
  category: t.Union([
    t.Literal("normal"),
    t.Literal("screenshot"),
    t.Literal("screen-recording"),
    t.Null(),
  ]),
});

// 舊版只記錄 檔名 → 資料夾名稱
const editSessionSchema = t.Record(
  t.String(),
  t.Union([t.String(), editRecordSchema])
);

export class EditSessionStoreJson implements EditSessionStore {
  private readonly document: JsonDocumentStore<typeof editSessionSchema>;

  constructor(filePath: string) {
    this.document = new JsonDocumentStore(
      filePath,
      editSessionSchema,
      () => ({})
    );
  }

  async load(): Promise<Result<EditSession, StoreReadError>> {
    const result = await this.document.read();
    if (isErr(result)) return result;
    const session: EditSession = new Map();
    for (const [identity, value] of Object.entries(result.value)) {
      const record: EditRecord =
        typeof value === "string"
          ? { year: null, folder: value, category: null }
          : value;
      session.set(identity, record);
    }
    return ok(session);
  }

  async save(session: EditSession): Promise<Result<null, StoreWriteError>> {
    const sorted = [...session.entries()].sort(([a], [b]) =>
      a.localeCompare(b)
    );
    return this.document.write(Object.fromEntries(sorted));
  }
}
