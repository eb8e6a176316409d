import type { CAC } from "cac";

import type { Logger } from "~shared/Logger";

import { confirm } from "@/utils/helper";

import { unwrap, withContext } from "./context";
import { logApplyReport, planReport } from "./report";

type Options = {
  yes?: boolean;
  autoOnly?: boolean;
  exif?: boolean;
};

export function registerApply(cli: CAC, baseLogger: Logger) {
  cli
    .command("apply [root]", "依計畫搬移檔案，重複的截圖送到回收區")
    .option("--yes", "略過確認直接執行", { default: false })
    .option("--auto-only", "只處理截圖與螢幕錄影", { default: false })
    .option("--exif", "檔名沒有日期時讀取 EXIF 拍攝時間", { default: false })
    .action(async (root: string | undefined, options: Options) => {
      const logger = baseLogger.extend("apply");
      await withContext(logger, { root, exif: options.exif }, async (ctx) => {
        const autoOnly = options.autoOnly;
        const preview = unwrap(ctx.session.preview({ autoOnly }));
        await ctx.dumper.dump("arrange-plan", planReport(ctx.root, preview));
        if (preview.moves.length === 0 && preview.trashes.length === 0) {
          logger.info({ emoji: "✅" })`沒有需要搬移的檔案`;
          return;
        }

        const proceed =
          options.yes ||
          (await confirm(
            `將搬移 ${preview.moves.length} 個檔案，刪除 ${preview.trashes.length} 個重複截圖，是否繼續？ [y/N] `
          ));
        if (!proceed) {
          logger.warn({ emoji: "⏹️" })`使用者取消`;
          return;
        }

        const { report } = unwrap(await ctx.session.apply({ autoOnly }));
        await ctx.dumper.dump("arrange-result", report);
        logApplyReport(logger, report);
      });
    });
}
