import type { CAC } from "cac";

import type { Logger } from "~shared/Logger";

import { confirm, toPosixRelative } from "@/utils/helper";

import { unwrap, withContext } from "./context";
import { logApplyReport } from "./report";

type Options = {
  yes?: boolean;
};

export function registerCleanCategoryCopies(cli: CAC, baseLogger: Logger) {
  cli
    .command(
      "clean-category-copies [root]",
      "刪除截圖類資料夾中已存在於一般資料夾的副本"
    )
    .option("--yes", "略過確認直接執行", { default: false })
    .action(async (root: string | undefined, options: Options) => {
      const logger = baseLogger.extend("clean-category-copies");
      await withContext(logger, { root }, async (ctx) => {
        const copies = ctx.session.inventory?.redundantCategoryCopies ?? [];
        if (copies.length === 0) {
          logger.info({ emoji: "✅" })`沒有多餘的副本`;
          return;
        }
        await ctx.dumper.dump(
          "redundant-copies",
          copies.map((c) => ({
            path: toPosixRelative(ctx.root, c.path),
            keptIn: c.keptIn.map((f) => `${f.year}/${f.name}`),
          }))
        );
        const proceed =
          options.yes ||
          (await confirm(`將刪除 ${copies.length} 個多餘副本，是否繼續？ [y/N] `));
        if (!proceed) {
          logger.warn({ emoji: "⏹️" })`使用者取消`;
          return;
        }
        const report = unwrap(await ctx.session.trashRedundantCategoryCopies());
        await ctx.dumper.dump("redundant-copies-result", report);
        logApplyReport(logger, report);
      });
    });
}
