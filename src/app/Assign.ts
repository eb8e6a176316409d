import type { CAC } from "cac";

import type { Logger } from "~shared/Logger";

import type { AssignPatch } from "@/services/OrganizerSession";
import type { FileCategory } from "@/types";

import { CommandError, toYear, unwrap, withContext } from "./context";

type Options = {
  root?: string;
  folder?: string;
  year?: unknown;
  category?: string;
  clear?: boolean;
  exif?: boolean;
};

const categories: ReadonlySet<string> = new Set<FileCategory>([
  "normal",
  "screenshot",
  "screen-recording",
]);

function isCategory(value: string): value is FileCategory {
  return categories.has(value);
}

export function registerAssign(cli: CAC, baseLogger: Logger) {
  cli
    .command("assign <...files>", "指定檔案的目標資料夾、年份或分類")
    .option("--root <root>", "相機資料夾，未指定時使用已設定的資料夾")
    .option("--folder <name>", "目標資料夾名稱，none 表示清除")
    .option("--year <year>", "覆寫年份，none 表示清除")
    .option(
      "--category <category>",
      "覆寫分類：normal、screenshot、screen-recording，none 表示清除"
    )
    .option("--clear", "清除這些檔案的所有設定", { default: false })
    .option("--exif", "檔名沒有日期時讀取 EXIF 拍攝時間", { default: false })
    .action(async (files: string[], options: Options) => {
      const logger = baseLogger.extend("assign");
      const patch = toPatch(options);
      if (Object.keys(patch).length === 0) {
        throw new CommandError("請至少指定 --folder、--year、--category 或 --clear");
      }
      const contextOptions = { root: options.root, exif: options.exif };
      await withContext(logger, contextOptions, async (ctx) => {
        const updated = unwrap(await ctx.session.assign(files, patch));
        for (const entry of updated) {
          logger.info({
            emoji: "📁",
            state: entry.state,
          })`${entry.identity}: ${entry.year ?? "?"} / ${entry.assignedFolder ?? "-"}`;
        }
      });
    });
}

function toPatch(options: Options): AssignPatch {
  if (options.clear) return { folder: null, year: null, category: null };
  const patch: AssignPatch = {};
  if (options.folder !== undefined) {
    patch.folder = options.folder === "none" ? null : String(options.folder);
  }
  const year = toYear(options.year);
  if (year !== undefined) patch.year = year;
  if (options.category !== undefined) {
    const category = String(options.category);
    if (category === "none") {
      patch.category = null;
    } else if (isCategory(category)) {
      patch.category = category;
    } else {
      throw new CommandError(`未知的分類: ${category}`);
    }
  }
  return patch;
}
