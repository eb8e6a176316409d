import { isValid, parse } from "date-fns";
import path from "node:path";

import { imageExtensions, videoExtensions } from "@/constants";
import type { FileCategory, FileKind } from "@/types";

import type {
  CategoryRule,
  Classification,
  PathClassifier,
} from "./PathClassifier";

export const defaultCategoryRules: CategoryRule[] = [
  { category: "screenshot", keywords: ["screenshot"] },
  { category: "screen-recording", keywords: ["screen", "recorder"] },
];

// IMG_20240815_123456.jpg / VID20240815123456.mp4
const dateTimeRegex = /(?<!\d)(\d{8})[_-]?(\d{6})(?!\d)/;
// IMG_20240815_WA0001.jpg：年份一律取前四碼，不檢查月日
const compactDateRegex = /(?<!\d)(\d{4})\d{4}(?:[_-]?\d{6})?(?!\d)/;
// Screenshot_2024-08-15-10-00-00.png
const dashedDateRegex = /(?<!\d)(\d{4})-(\d{2})-(\d{2})(?!\d)/g;
const bareYearRegex = /(?<!\d)(20\d{2})(?!\d)/;

const referenceDate = new Date(0);

const imageExtensionSet: ReadonlySet<string> = new Set(imageExtensions);
const videoExtensionSet: ReadonlySet<string> = new Set(videoExtensions);

export class PathClassifierDefault implements PathClassifier {
  private readonly rules: CategoryRule[];

  constructor(rules: CategoryRule[] = defaultCategoryRules) {
    this.rules = rules;
  }

  classify(filename: string): Classification {
    const capturedAt = extractCapturedAt(filename);
    return {
      year: capturedAt ? capturedAt.getFullYear() : extractYear(filename),
      category: this.categorize(filename),
      kind: kindOf(filename),
      capturedAt,
    };
  }

  private categorize(filename: string): FileCategory {
    const lower = filename.toLowerCase();
    const rule = this.rules.find((r) =>
      r.keywords.every((k) => lower.includes(k.toLowerCase()))
    );
    return rule?.category ?? "normal";
  }
}

function extractCapturedAt(filename: string): Date | null {
  const match = dateTimeRegex.exec(filename);
  if (!match) return null;
  const date = parse(`${match[1]}${match[2]}`, "yyyyMMddHHmmss", referenceDate);
  return isValid(date) && inYearRange(date.getFullYear()) ? date : null;
}

function extractYear(filename: string): number | null {
  const compact = compactDateRegex.exec(filename);
  if (compact) return Number(compact[1]);
  for (const match of filename.matchAll(dashedDateRegex)) {
    const date = parse(
      `${match[1]}${match[2]}${match[3]}`,
      "yyyyMMdd",
      referenceDate
    );
    if (isValid(date) && inYearRange(date.getFullYear())) {
      return date.getFullYear();
    }
  }
  const bare = bareYearRegex.exec(filename);
  return bare ? Number(bare[1]) : null;
}

function inYearRange(year: number) {
  return year >= 1900 && year <= 2099;
}

export function kindOf(filename: string): FileKind {
  const ext = path.extname(filename).toLowerCase();
  if (imageExtensionSet.has(ext)) return "image";
  if (videoExtensionSet.has(ext)) return "video";
  return "other";
}
