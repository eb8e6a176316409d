import { describe, expect, test } from "vitest";

import {
  PathClassifierDefault,
  kindOf,
} from "@/services/PathClassifierDefault";

describe("PathClassifierDefault", () => {
  const classifier = new PathClassifierDefault();

  test("檔名含日期時間時取得年份與拍攝時間", () => {
    const result = classifier.classify("IMG_20240815_123456.jpg");
    expect(result.year).toBe(2024);
    expect(result.kind).toBe("image");
    expect(result.category).toBe("normal");
    expect(result.capturedAt).toEqual(new Date(2024, 7, 15, 12, 34, 56));
  });

  test("日期與時間之間沒有分隔字元也能解析", () => {
    const result = classifier.classify("VID20221231235959.mp4");
    expect(result.year).toBe(2022);
    expect(result.kind).toBe("video");
    expect(result.capturedAt).toEqual(new Date(2022, 11, 31, 23, 59, 59));
  });

  test("以連字號分隔的日期只取年份", () => {
    const result = classifier.classify("Screenshot_2023-05-01-10-00-00.png");
    expect(result.year).toBe(2023);
    expect(result.category).toBe("screenshot");
    expect(result.capturedAt).toBeNull();
  });

  test("螢幕錄影需同時包含 screen 與 recorder", () => {
    expect(
      classifier.classify("Screen_Recorder_20220101_101010.mp4").category
    ).toBe("screen-recording");
    expect(classifier.classify("screen_20220101.mp4").category).toBe("normal");
  });

  test("月日不合法時仍取前四碼為年份，但沒有拍攝時間", () => {
    const result = classifier.classify("IMG_20231345_000000.jpg");
    expect(result.year).toBe(2023);
    expect(result.capturedAt).toBeNull();
    expect(classifier.classify("IMG_20240230_x.jpg").year).toBe(2024);
    expect(classifier.classify("IMG_20240001_x.jpg").year).toBe(2024);
    expect(classifier.classify("IMG_18500101_x.jpg").year).toBe(1850);
  });

  test("不合法的連字號日期改用獨立的 20YY", () => {
    expect(classifier.classify("Screenshot_2023-13-40.png").year).toBe(2023);
    expect(classifier.classify("Screenshot_1850-13-40.png").year).toBeNull();
  });

  test("沒有完整日期時使用獨立的 20YY", () => {
    expect(classifier.classify("DSC_2019_trip.jpg").year).toBe(2019);
    expect(classifier.classify("DSC_120190.jpg").year).toBeNull();
  });

  test("1900 年代的日期也能辨識", () => {
    expect(classifier.classify("SCAN_19991231.jpg").year).toBe(1999);
  });

  test("找不到日期時年份為 null", () => {
    const result = classifier.classify("IMG_0001.JPG");
    expect(result.year).toBeNull();
    expect(result.kind).toBe("image");
  });

  test("可自訂分類規則", () => {
    const custom = new PathClassifierDefault([
      { category: "screenshot", keywords: ["capture"] },
    ]);
    expect(custom.classify("Capture_2024.png").category).toBe("screenshot");
    expect(custom.classify("Screenshot_2024.png").category).toBe("normal");
  });
});

describe("kindOf", () => {
  test("副檔名不分大小寫", () => {
    expect(kindOf("a.HEIC")).toBe("image");
    expect(kindOf("b.MOV")).toBe("video");
    expect(kindOf("notes.txt")).toBe("other");
    expect(kindOf("README")).toBe("other");
  });
});
