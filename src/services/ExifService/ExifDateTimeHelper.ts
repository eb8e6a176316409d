import { isValid, parse } from "date-fns";
import { ExifDateTime } from "exiftool-vendored";

const RAW_FORMAT = "yyyy:MM:dd HH:mm:ss";

/**
 * 將 EXIF 時間轉成「拍攝地當地時間」的 Date。
 * 年份歸檔以相機上的時間為準，因此 rawValue 直接當作本地時間解析，不套用時區偏移。
 */
export function toLocalCaptureTime(value: unknown): Date | undefined {
  if (value instanceof ExifDateTime) {
    if (!value.isValid) return undefined;
    const raw = value.rawValue?.slice(0, RAW_FORMAT.length);
    if (raw) {
      const d = parse(raw, RAW_FORMAT, new Date(0));
      if (isValid(d)) return d;
    }
    const d = value.toDate();
    return isValid(d) ? d : undefined;
  }
  if (typeof value === "string") {
    const d = parse(value.slice(0, RAW_FORMAT.length), RAW_FORMAT, new Date(0));
    return isValid(d) ? d : undefined;
  }
  return undefined;
}
