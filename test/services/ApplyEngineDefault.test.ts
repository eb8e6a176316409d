import { readFile, readdir, rm } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

import { expectOk } from "~shared/testkit/ExpectResult";
import { buildTestLogger } from "~shared/testkit/TestLogger";

import { ApplyEngineDefault } from "@/services/ApplyEngineDefault";
import type { EditSession } from "@/services/EditSessionStore";
import { EditSessionStoreJson } from "@/services/EditSessionStoreJson";
import { TrashServiceFolder } from "@/services/TrashServiceFolder";
import { VideoFrameCache } from "@/services/VideoFrameCache";
import type { PlannedMove } from "@/types";
import { exists } from "@/utils/helper";
import { FileMoverFake } from "~test/fakes/FileMoverFake";
import { createTempDir, touch } from "~test/helpers/fixture";

describe("ApplyEngineDefault", () => {
  let dir: string;
  let root: string;
  let cleanup: () => Promise<void>;
  let mover: FileMoverFake;
  let store: EditSessionStoreJson;
  let trash: TrashServiceFolder;
  let engine: ApplyEngineDefault;

  beforeEach(async () => {
    ({ dir, cleanup } = await createTempDir("apply"));
    root = join(dir, "camera");
    mover = new FileMoverFake();
    store = new EditSessionStoreJson(join(dir, "state", "edits.json"));
    trash = new TrashServiceFolder({
      trashRoot: join(dir, "trash"),
      logger: buildTestLogger(),
      now: new Date(2024, 0, 1, 0, 0, 0),
    });
    engine = new ApplyEngineDefault({
      mover,
      trash,
      sessionStore: store,
      frameCache: new VideoFrameCache(root),
      logger: buildTestLogger(),
    });
  });

  afterEach(async () => {
    await cleanup();
  });

  function moveOf(identity: string, folder = "Trip"): PlannedMove {
    return {
      identity,
      from: join(root, identity),
      to: join(root, "2024", folder, identity),
      relativeTo: `2024/${folder}/${identity}`,
      reason: "organize",
      renamed: false,
    };
  }

  async function seedEdits(identities: string[]) {
    const session: EditSession = new Map(
      identities.map((id) => [id, { year: null, folder: "Trip", category: null }])
    );
    expectOk(await store.save(session));
  }

  async function remainingEdits() {
    const loaded = await store.load();
    expectOk(loaded);
    return [...loaded.value.keys()];
  }

  test("單一檔案失敗不影響其他檔案，成功的從編輯紀錄移除", async () => {
    const names = ["a.jpg", "b.jpg", "c.jpg", "d.jpg", "e.jpg"];
    for (const name of names) await touch(root, name);
    await seedEdits(names);
    mover.failOn(join(root, "c.jpg"));

    const report = await engine.apply({
      moves: names.map((n) => moveOf(n)),
      trashes: [],
    });

    expect(report.summary).toEqual({ succeeded: 4, skipped: 0, failed: 1 });
    expect(report.results[2]).toMatchObject({
      identity: "c.jpg",
      status: "failed",
      reason: "MOVE_FAILED",
    });
    expect(report.sessionWarning).toBeUndefined();
    expect(await exists(join(root, "c.jpg"))).toBe(true);
    expect((await readdir(join(root, "2024", "Trip"))).sort()).toEqual([
      "a.jpg",
      "b.jpg",
      "d.jpg",
      "e.jpg",
    ]);
    expect(await remainingEdits()).toEqual(["c.jpg"]);
  });

  test("目標位置在計畫後出現同名檔案時改名，不覆寫", async () => {
    await touch(root, "a.jpg", "new");
    await touch(root, "2024/Trip/a.jpg", "existing");

    const report = await engine.apply({ moves: [moveOf("a.jpg")], trashes: [] });

    const target = join(root, "2024", "Trip", "a_1.jpg");
    expect(report.results[0]).toMatchObject({
      status: "success",
      to: target,
      renamed: true,
    });
    expect(await readFile(join(root, "2024", "Trip", "a.jpg"), "utf-8")).toBe(
      "existing"
    );
    expect(await readFile(target, "utf-8")).toBe("new");
  });

  test("來源已不存在時略過，並保留編輯紀錄", async () => {
    await touch(root, "a.jpg");
    await seedEdits(["a.jpg"]);
    await rm(join(root, "a.jpg"));

    const report = await engine.apply({ moves: [moveOf("a.jpg")], trashes: [] });

    expect(report.summary).toEqual({ succeeded: 0, skipped: 1, failed: 0 });
    expect(report.results[0].reason).toBe("SOURCE_MISSING");
    expect(await remainingEdits()).toEqual(["a.jpg"]);
  });

  test("搬移影片後清除其預覽截圖", async () => {
    await touch(root, "VID_1.mp4");
    const frame = VideoFrameCache.frameName(join(root, "VID_1.mp4"), 50);
    await touch(root, `!tempvideoscreen/${frame}`);

    const report = await engine.apply({
      moves: [moveOf("VID_1.mp4")],
      trashes: [],
    });

    expect(report.summary.succeeded).toBe(1);
    expect(await readdir(join(root, "!tempvideoscreen"))).toEqual([]);
  });

  test("刪除項目送到回收區；多餘副本不影響編輯紀錄", async () => {
    const shot = await touch(root, "Screenshot_1.png");
    const copy = await touch(root, "2024/!Screenshots_2024/IMG_9.jpg");
    await seedEdits(["Screenshot_1.png", "IMG_9.jpg"]);

    const report = await engine.apply({
      moves: [],
      trashes: [
        {
          identity: "Screenshot_1.png",
          from: shot,
          reason: "duplicate-screenshot",
        },
        { identity: "IMG_9.jpg", from: copy, reason: "redundant-copy" },
        {
          identity: "gone.png",
          from: join(root, "gone.png"),
          reason: "user-delete",
        },
      ],
    });

    expect(report.results.map((r) => [r.identity, r.status])).toEqual([
      ["Screenshot_1.png", "success"],
      ["IMG_9.jpg", "success"],
      ["gone.png", "skipped"],
    ]);
    expect((await readdir(trash.directory)).sort()).toEqual([
      "IMG_9.jpg",
      "Screenshot_1.png",
    ]);
    expect(await remainingEdits()).toEqual(["IMG_9.jpg"]);
  });

  test("編輯紀錄損毀時回報警告，檔案仍完成搬移", async () => {
    await touch(root, "a.jpg");
    await touch(dir, "state/edits.json", "{broken");

    const report = await engine.apply({ moves: [moveOf("a.jpg")], trashes: [] });

    expect(report.summary.succeeded).toBe(1);
    expect(report.sessionWarning).toMatch(/^無法更新編輯紀錄: /);
  });
});
