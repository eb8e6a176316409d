import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { describe, expect, test } from "vitest";

import {
  copyThenUnlink,
  expandHome,
  exists,
  toPosixRelative,
  withNumericSuffix,
} from "@/utils/helper";
import { createTempDir, touch } from "~test/helpers/fixture";

describe("helper", () => {
  test("流水號加在副檔名之前", () => {
    expect(withNumericSuffix("IMG_001.jpg", 2)).toBe("IMG_001_2.jpg");
    expect(withNumericSuffix("README", 1)).toBe("README_1");
  });

  test("展開 ~/", () => {
    expect(expandHome("~/photos")).toBe(join(homedir(), "photos"));
    expect(expandHome("/abs/photos")).toBe("/abs/photos");
  });

  test("跨磁碟搬移不覆寫已存在的目標", async () => {
    const { dir, cleanup } = await createTempDir("helper");
    try {
      await touch(dir, "a.jpg", "new");
      await touch(dir, "b.jpg", "old");
      await expect(
        copyThenUnlink(join(dir, "a.jpg"), join(dir, "b.jpg"))
      ).rejects.toMatchObject({ code: "EEXIST" });
      expect(await readFile(join(dir, "b.jpg"), "utf-8")).toBe("old");
      expect(await exists(join(dir, "a.jpg"))).toBe(true);

      await copyThenUnlink(join(dir, "a.jpg"), join(dir, "c.jpg"));
      expect(await readFile(join(dir, "c.jpg"), "utf-8")).toBe("new");
      expect(await exists(join(dir, "a.jpg"))).toBe(false);
    } finally {
      await cleanup();
    }
  });

  test("相對路徑以 / 分隔", () => {
    expect(toPosixRelative("/camera", "/camera/2024/Trip/a.jpg")).toBe(
      "2024/Trip/a.jpg"
    );
  });
});
