import type { Result } from "~shared/utils/Result";

export type ReadError =
  | { type: "FILE_NOT_FOUND"; message: string }
  | { type: "READ_FAILED"; message: string }
  | { type: "NO_CAPTURE_TIME"; message: string };

export interface ExifService {
  /**
   * 讀取拍攝時間（相機當地時間）。
   * 用於檔名沒有日期時推斷年份。
   */
  readCaptureTime(filePath: string): Promise<Result<Date, ReadError>>;
}
