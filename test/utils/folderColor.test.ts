import { describe, expect, test } from "vitest";

import { colorTagOf, hslToHex } from "@/utils/folderColor";

describe("folderColor", () => {
  test("HSL 轉 hex", () => {
    expect(hslToHex(0, 0.4, 0.9)).toBe("#efdbdb");
    expect(hslToHex(120, 0.4, 0.9)).toBe("#dbefdb");
    expect(hslToHex(240, 0.4, 0.9)).toBe("#dbdbef");
  });

  test("同名資料夾永遠得到相同的淡色", () => {
    const color = colorTagOf("Trip");
    expect(colorTagOf("Trip")).toBe(color);
    expect(color).toMatch(/^#[d-e][0-9a-f]{5}$/);
  });
});
