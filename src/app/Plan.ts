import type { CAC } from "cac";

import type { Logger } from "~shared/Logger";

import { unwrap, withContext } from "./context";
import { planReport } from "./report";

type Options = {
  autoOnly?: boolean;
  exif?: boolean;
};

export function registerPlan(cli: CAC, baseLogger: Logger) {
  cli
    .command("plan [root]", "預覽搬移計畫，不會變更任何檔案")
    .option("--auto-only", "只處理截圖與螢幕錄影", { default: false })
    .option("--exif", "檔名沒有日期時讀取 EXIF 拍攝時間", { default: false })
    .action(async (root: string | undefined, options: Options) => {
      const logger = baseLogger.extend("plan");
      await withContext(logger, { root, exif: options.exif }, async (ctx) => {
        const plan = unwrap(
          ctx.session.preview({ autoOnly: options.autoOnly })
        );
        const report = planReport(ctx.root, plan);
        await ctx.dumper.dump("arrange-plan", report);
        for (const line of report.moves) logger.info({ emoji: "➡️" })`${line}`;
        for (const line of report.trashes) {
          logger.info({ emoji: "🗑️" })`${line}`;
        }
        for (const issue of plan.issues) {
          logger.warn({ type: issue.type })`${issue.identity}: ${issue.message}`;
        }
        logger.info({
          emoji: "📋",
          ...report.summary,
        })`搬移 ${plan.moves.length} 個，刪除 ${plan.trashes.length} 個`;
      });
    });
}
