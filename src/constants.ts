export const imageExtensions = [
  ".jpg",
  ".jpeg",
  ".png",
  ".gif",
  ".bmp",
  ".tiff",
  ".tif",
  ".heic",
  ".heif",
  ".webp",
] as const;

export const videoExtensions = [
  ".mp4",
  ".avi",
  ".mov",
  ".wmv",
  ".flv",
  ".mkv",
  ".m4v",
  ".3gp",
  ".webm",
  ".mts",
] as const;

/** 以 `!` 開頭的資料夾都由程式管理，不屬於使用者整理的資料夾 */
export const reservedPrefix = "!";
export const duplicateFolderName = "!duplicate";
export const videoCacheFolderName = "!tempvideoscreen";
export const screenshotFolderPrefix = "!Screenshots_";
export const screenRecorderFolderPrefix = "!ScreenRecorder_";

export const yearFolderPattern = /^\d{4}$/;

export const maxCollisionAttempts = 999;
