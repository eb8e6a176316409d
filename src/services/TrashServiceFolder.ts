import { format } from "date-fns";
import { mkdir } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import { maxCollisionAttempts } from "@/constants";
import {
  errorMessage,
  exists,
  moveFile,
  withNumericSuffix,
} from "@/utils/helper";

import type { TrashError, TrashService } from "./TrashService";

/**
 * 將檔案搬到回收資料夾下的批次子資料夾，例如
 * `~/.camera-organizer/trash/camera_20240817103000/IMG_001.jpg`。
 * 同一個實例的所有刪除都放在同一個批次。
 */
export class TrashServiceFolder implements TrashService {
  private readonly batchDir: string;
  private readonly logger: Logger;

  constructor(deps: { trashRoot: string; logger: Logger; now?: Date }) {
    const stamp = format(deps.now ?? new Date(), "yyyyMMddHHmmss");
    this.batchDir = path.join(deps.trashRoot, `camera_${stamp}`);
    this.logger = deps.logger.extend("TrashServiceFolder");
  }

  get directory() {
    return this.batchDir;
  }

  async moveToTrash(filePath: string): Promise<Result<string, TrashError>> {
    if (!(await exists(filePath))) {
      return err({
        type: "SOURCE_MISSING",
        message: `檔案不存在: ${filePath}`,
      });
    }
    try {
      await mkdir(this.batchDir, { recursive: true });
      const fileName = path.basename(filePath);
      let dest = path.join(this.batchDir, fileName);
      for (let n = 1; await exists(dest); n++) {
        if (n > maxCollisionAttempts) {
          return err({
            type: "TRASH_FAILED",
            message: `回收區中找不到可用的檔名: ${fileName}`,
          });
        }
        dest = path.join(this.batchDir, withNumericSuffix(fileName, n));
      }
      await moveFile(filePath, dest);
      this.logger.debug({ emoji: "🗑️", from: filePath })`已移至回收區 ${dest}`;
      return ok(dest);
    } catch (e) {
      return err({ type: "TRASH_FAILED", message: errorMessage(e) });
    }
  }
}
