import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";
import { buildTestLogger } from "~shared/testkit/TestLogger";

import { TrashServiceFolder } from "@/services/TrashServiceFolder";
import { exists } from "@/utils/helper";
import { createTempDir, touch } from "~test/helpers/fixture";

describe("TrashServiceFolder", () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await createTempDir("trash"));
  });

  afterEach(async () => {
    await cleanup();
  });

  function buildTrash() {
    return new TrashServiceFolder({
      trashRoot: join(dir, "trash"),
      logger: buildTestLogger(),
      now: new Date(2024, 7, 17, 10, 30, 0),
    });
  }

  test("檔案搬到以時間命名的批次資料夾，可復原", async () => {
    const source = await touch(dir, "camera/IMG_1.jpg", "original");
    const trash = buildTrash();

    const result = await trash.moveToTrash(source);
    expectOk(result);
    expect(trash.directory).toBe(join(dir, "trash", "camera_20240817103000"));
    expect(result.value).toBe(join(trash.directory, "IMG_1.jpg"));
    expect(await exists(source)).toBe(false);
    expect(await readFile(result.value, "utf-8")).toBe("original");
  });

  test("同批次內同名檔案加上流水號", async () => {
    const a = await touch(dir, "camera/IMG_1.jpg", "a");
    const b = await touch(dir, "camera/2024/Trip/IMG_1.jpg", "b");
    const trash = buildTrash();

    const first = await trash.moveToTrash(a);
    const second = await trash.moveToTrash(b);
    expectOk(first);
    expectOk(second);
    expect(second.value).toBe(join(trash.directory, "IMG_1_1.jpg"));
    expect(await readFile(second.value, "utf-8")).toBe("b");
  });

  test("來源不存在時回傳 SOURCE_MISSING", async () => {
    const result = await buildTrash().moveToTrash(join(dir, "missing.jpg"));
    expectErr(result);
    expect(result.error.type).toBe("SOURCE_MISSING");
  });
});
