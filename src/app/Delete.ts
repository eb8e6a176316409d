import type { CAC } from "cac";

import type { Logger } from "~shared/Logger";

import { confirm } from "@/utils/helper";

import { unwrap, withContext } from "./context";
import { logApplyReport } from "./report";

type Options = {
  root?: string;
  yes?: boolean;
};

export function registerDelete(cli: CAC, baseLogger: Logger) {
  cli
    .command("delete <...files>", "將待整理檔案送到回收區")
    .option("--root <root>", "相機資料夾，未指定時使用已設定的資料夾")
    .option("--yes", "略過確認直接執行", { default: false })
    .action(async (files: string[], options: Options) => {
      const logger = baseLogger.extend("delete");
      await withContext(logger, { root: options.root }, async (ctx) => {
        const proceed =
          options.yes ||
          (await confirm(`將刪除 ${files.length} 個檔案，是否繼續？ [y/N] `));
        if (!proceed) {
          logger.warn({ emoji: "⏹️" })`使用者取消`;
          return;
        }
        const report = unwrap(await ctx.session.deleteEntries(files));
        await ctx.dumper.dump("delete-result", report);
        logApplyReport(logger, report);
      });
    });
}
