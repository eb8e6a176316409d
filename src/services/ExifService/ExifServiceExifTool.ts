import { exiftool } from "exiftool-vendored";

import { type Result, err, ok } from "~shared/utils/Result";

import { errorMessage, exists } from "@/utils/helper";

import { toLocalCaptureTime } from "./ExifDateTimeHelper";
import type { ExifService, ReadError } from "./ExifService";

export class ExifServiceExifTool implements ExifService {
  async readCaptureTime(filePath: string): Promise<Result<Date, ReadError>> {
    if (!(await exists(filePath))) {
      return err({ type: "FILE_NOT_FOUND", message: `找不到檔案: ${filePath}` });
    }
    try {
      const tags = await exiftool.read(filePath);
      const captureTime =
        toLocalCaptureTime(tags.DateTimeOriginal) ??
        toLocalCaptureTime(tags.CreateDate) ??
        toLocalCaptureTime(tags.MediaCreateDate);
      if (!captureTime) {
        return err({
          type: "NO_CAPTURE_TIME",
          message: `無拍攝時間: ${filePath}`,
        });
      }
      return ok(captureTime);
    } catch (e) {
      return err({
        type: "READ_FAILED",
        message: `讀取 EXIF 失敗: ${filePath}: ${errorMessage(e)}`,
      });
    }
  }

  async [Symbol.asyncDispose]() {
    await exiftool.end();
  }
}
