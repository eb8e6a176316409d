import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, dirname, join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import { buildTestLogger } from "~shared/testkit/TestLogger";

describe("DumpWriterDefault", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "camera-organizer-dump-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("以時間戳記命名並寫出格式化的 JSON", async () => {
    const writer = new DumpWriterDefault(buildTestLogger(), join(dir, "out"));
    const file = await writer.dump("plan", { moves: 1 });

    expect(dirname(file)).toBe(join(dir, "out"));
    expect(basename(file)).toMatch(/^\d{8}-\d{6}-\d{3}-plan\.json$/);
    expect(await readFile(file, "utf-8")).toBe('{\n  "moves": 1\n}');
  });
});
