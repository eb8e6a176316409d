import { readdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";
import { expectHasSubset } from "~shared/testkit/ExpectSubset";
import { buildTestLogger } from "~shared/testkit/TestLogger";

import { DuplicateResolverDefault } from "@/services/DuplicateResolverDefault";
import { InventoryScannerDefault } from "@/services/InventoryScanner";
import { PathClassifierDefault } from "@/services/PathClassifierDefault";
import { ExifServiceFake } from "~test/fakes/ExifServiceFake";
import { createTempDir, touch } from "~test/helpers/fixture";

function buildScanner(exifService?: ExifServiceFake) {
  return new InventoryScannerDefault({
    classifier: new PathClassifierDefault(),
    resolver: new DuplicateResolverDefault(),
    exifService,
    logger: buildTestLogger(),
  });
}

describe("InventoryScannerDefault", () => {
  let root: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir: root, cleanup } = await createTempDir("scanner"));
  });

  afterEach(async () => {
    await cleanup();
  });

  test("只收集根目錄的媒體檔，略過隱藏檔與其他檔案", async () => {
    await touch(root, "IMG_20240101_080000.jpg");
    await touch(root, "IMG_0001.jpg");
    await touch(root, ".hidden.jpg");
    await touch(root, "notes.txt");
    await touch(root, "misc/IMG_20240202_000000.jpg");

    const result = await buildScanner().scan(root);
    expectOk(result);
    const inventory = result.value;

    expect(inventory.root).toBe(root);
    expect(
      inventory.pending.map((e) => [e.identity, e.year, e.state])
    ).toEqual([
      ["IMG_0001.jpg", null, "unorganized"],
      ["IMG_20240101_080000.jpg", 2024, "pending-assignment"],
    ]);
    expect(inventory.pending[1].sourcePath).toBe(
      join(root, "IMG_20240101_080000.jpg")
    );
  });

  test("依拍攝時間排序，沒有時間的排在前面", async () => {
    await touch(root, "IMG_20240301_000000.jpg");
    await touch(root, "IMG_20240101_000000.jpg");
    await touch(root, "DSC_2023.jpg");

    const result = await buildScanner().scan(root);
    expectOk(result);
    expect(result.value.pending.map((e) => e.identity)).toEqual([
      "DSC_2023.jpg",
      "IMG_20240101_000000.jpg",
      "IMG_20240301_000000.jpg",
    ]);
  });

  test("收集年份資料夾、截圖類資料夾與重複區", async () => {
    await touch(root, "2024/Trip/IMG_1.jpg");
    await touch(root, "2024/Trip/.DS_Store");
    await touch(root, "2024/!Screenshots_2024/Screenshot_1.png");
    await touch(root, "2024/!ScreenRecorder_2024/Screen_Recorder_1.mp4");
    await touch(root, "2024/!private/IMG_x.jpg");
    await touch(root, "2024/loose.jpg");
    await touch(root, "!duplicate/IMG_old.jpg");
    await touch(root, "!tempvideoscreen/abcd1234_010.jpg");
    await touch(root, "Albums/IMG_2.jpg");

    const result = await buildScanner().scan(root);
    expectOk(result);
    const inventory = result.value;

    expect(inventory.organizedFolders).toEqual([
      {
        year: 2024,
        name: "Trip",
        path: join(root, "2024", "Trip"),
        colorTag: expect.stringMatching(/^#[0-9a-f]{6}$/),
        memberIdentities: ["IMG_1.jpg"],
      },
    ]);
    expect(
      inventory.categoryFolders.map((f) => [f.name, f.category, f.memberIdentities])
    ).toEqual([
      ["!ScreenRecorder_2024", "screen-recording", ["Screen_Recorder_1.mp4"]],
      ["!Screenshots_2024", "screenshot", ["Screenshot_1.png"]],
    ]);
    expect(inventory.duplicateArea).toEqual(["IMG_old.jpg"]);
    expect(inventory.pending).toEqual([]);
  });

  test("與已整理資料夾同名的檔案標記為重複", async () => {
    await touch(root, "2023/Party/IMG_1.jpg");
    await touch(root, "IMG_1.jpg");
    await touch(root, "Screenshot_20240101_101010.png");
    await touch(root, "2024/!Screenshots_2024/Screenshot_20240101_101010.png");

    const result = await buildScanner().scan(root);
    expectOk(result);
    const byId = new Map(result.value.pending.map((e) => [e.identity, e]));

    expect(byId.get("IMG_1.jpg")?.state).toBe("duplicate");
    expect(byId.get("IMG_1.jpg")?.duplicateAction).toBe("relocate");
    expect(byId.get("Screenshot_20240101_101010.png")?.duplicateAction).toBe(
      "trash"
    );
  });

  test("忽略清單中的重複檔案仍標記為重複", async () => {
    await touch(root, "2023/Party/IMG_1.jpg");
    await touch(root, "IMG_1.jpg");

    const result = await buildScanner().scan(root, {
      ignoreList: new Set(["IMG_1.jpg"]),
    });
    expectOk(result);
    expect(result.value.pending[0].state).toBe("duplicate");
    expect(result.value.pending[0].duplicateAction).toBe("relocate");
  });

  test("重複掃描得到相同結果，且不變更檔案系統", async () => {
    await touch(root, "IMG_20240101_000000.jpg");
    await touch(root, "2024/Trip/IMG_20240101_000000.jpg");
    const before = await readdir(root, { recursive: true });

    const scanner = buildScanner();
    const first = await scanner.scan(root);
    const second = await scanner.scan(root);
    expectOk(first);
    expectOk(second);

    expect(second.value.pending).toEqual(first.value.pending);
    expect(second.value.organizedFolders).toEqual(first.value.organizedFolders);
    expect((await readdir(root, { recursive: true })).sort()).toEqual(
      before.sort()
    );
  });

  test("檔名沒有年份時可由 EXIF 推斷", async () => {
    const target = await touch(root, "IMG_0001.jpg");
    await touch(root, "IMG_0002.jpg");
    const exif = new ExifServiceFake();
    exif.setCaptureTime(target, new Date(2021, 5, 1, 9, 0, 0));

    const result = await buildScanner(exif).scan(root, { exifFallback: true });
    expectOk(result);
    const [unknown, fromExif] = result.value.pending;
    expect(unknown.identity).toBe("IMG_0002.jpg");
    expect(unknown.year).toBeNull();
    expectHasSubset(fromExif, {
      identity: "IMG_0001.jpg",
      year: 2021,
      yearSource: "exif",
      state: "pending-assignment",
    });
  });

  test("未要求時不讀取 EXIF", async () => {
    await touch(root, "IMG_0001.jpg");
    const exif = new ExifServiceFake();
    const result = await buildScanner(exif).scan(root);
    expectOk(result);
    expect(exif.reads).toEqual([]);
  });

  test("根目錄不存在或不是資料夾時回傳錯誤", async () => {
    const missing = await buildScanner().scan(join(root, "missing"));
    expectErr(missing);
    expect(missing.error.type).toBe("ROOT_NOT_FOUND");

    const file = join(root, "file.jpg");
    await writeFile(file, "x");
    const notDir = await buildScanner().scan(file);
    expectErr(notDir);
    expect(notDir.error.type).toBe("ROOT_NOT_DIRECTORY");
  });
});
