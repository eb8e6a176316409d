import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import { errorMessage, isErrnoException } from "@/utils/helper";

export type StoreReadError = {
  type: "READ_ERROR" | "INVALID_DOCUMENT";
  message: string;
};

export type StoreWriteError = {
  type: "WRITE_ERROR";
  message: string;
};

/**
 * 以單一 JSON 檔保存的文件。
 * 檔案不存在時回傳 fallback；每次寫入都整份覆寫（先寫暫存檔再 rename）。
 */
export class JsonDocumentStore<T extends TSchema> {
  readonly filePath: string;
  private readonly schema: T;
  private readonly fallback: () => Static<T>;

  constructor(filePath: string, schema: T, fallback: () => Static<T>) {
    this.filePath = filePath;
    this.schema = schema;
    this.fallback = fallback;
  }

  async read(): Promise<Result<Static<T>, StoreReadError>> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf-8");
    } catch (e) {
      if (isErrnoException(e) && e.code === "ENOENT") {
        return ok(this.fallback());
      }
      return err({
        type: "READ_ERROR",
        message: `讀取 ${this.filePath} 失敗: ${errorMessage(e)}`,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (e) {
      return err({
        type: "INVALID_DOCUMENT",
        message: `${this.filePath} 不是合法的 JSON: ${errorMessage(e)}`,
      });
    }
    if (!Value.Check(this.schema, raw)) {
      const first = Value.Errors(this.schema, raw).First();
      return err({
        type: "INVALID_DOCUMENT",
        message: `${this.filePath} 格式錯誤 ${first?.path ?? ""}: ${first?.message ?? ""}`,
      });
    }
    return ok(raw);
  }

  async write(document: Static<T>): Promise<Result<null, StoreWriteError>> {
    const tmpPath = `${this.filePath}.tmp`;
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(tmpPath, JSON.stringify(document, null, 2), "utf-8");
      await rename(tmpPath, this.filePath);
      return ok(null);
    } catch (e) {
      return err({
        type: "WRITE_ERROR",
        message: `寫入 ${this.filePath} 失敗: ${errorMessage(e)}`,
      });
    }
  }
}
