import { createHash } from "node:crypto";
import { readdir, rm } from "node:fs/promises";
import path from "node:path";

import { videoCacheFolderName } from "@/constants";
import { isErrnoException } from "@/utils/helper";

/**
 * 影片預覽截圖的快取位置：`<root>/!tempvideoscreen/{key}_{百分比}.jpg`。
 * 截圖由外部解碼程式產生；這裡只負責在影片搬移或刪除後清掉舊的快取。
 */
export class VideoFrameCache {
  readonly directory: string;

  constructor(root: string) {
    this.directory = path.join(root, videoCacheFolderName);
  }

  static keyFor(sourcePath: string) {
    return createHash("sha1").update(sourcePath).digest("hex").slice(0, 8);
  }

  static frameName(sourcePath: string, percentage: number) {
    const pct = String(percentage).padStart(3, "0");
    return `${VideoFrameCache.keyFor(sourcePath)}_${pct}.jpg`;
  }

  /** 刪除該影片的所有截圖，回傳刪除數量；快取資料夾不存在時為 0 */
  async purge(sourcePath: string): Promise<number> {
    const prefix = `${VideoFrameCache.keyFor(sourcePath)}_`;
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (e) {
      if (isErrnoException(e) && e.code === "ENOENT") return 0;
      throw e;
    }
    const frames = names.filter((n) => n.startsWith(prefix));
    for (const name of frames) {
      await rm(path.join(this.directory, name), { force: true });
    }
    return frames.length;
  }
}
