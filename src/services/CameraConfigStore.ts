import { Type as t } from "@sinclair/typebox";

import type { Result } from "~shared/utils/Result";

import {
  JsonDocumentStore,
  type StoreReadError,
  type StoreWriteError,
} from "./JsonDocumentStore";

const cameraConfigSchema = t.Object({
  cameraPath: t.Union([t.String(), t.Null()]),
});

export type CameraConfig = typeof cameraConfigSchema.static;

/** 記住上次使用的相機資料夾 */
export class CameraConfigStoreJson {
  private readonly document: JsonDocumentStore<typeof cameraConfigSchema>;

  constructor(filePath: string) {
    this.document = new JsonDocumentStore(filePath, cameraConfigSchema, () => ({
      cameraPath: null,
    }));
  }

  read(): Promise<Result<CameraConfig, StoreReadError>> {
    return this.document.read();
  }

  write(config: CameraConfig): Promise<Result<null, StoreWriteError>> {
    return this.document.write(config);
  }
}
