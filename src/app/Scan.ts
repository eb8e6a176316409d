import type { CAC } from "cac";

import type { Logger } from "~shared/Logger";

import { withContext } from "./context";
import { inventoryReport } from "./report";

type Options = {
  exif?: boolean;
};

export function registerScan(cli: CAC, baseLogger: Logger) {
  cli
    .command("scan [root]", "掃描相機資料夾，列出待整理檔案與重複狀態")
    .option("--exif", "檔名沒有日期時讀取 EXIF 拍攝時間", { default: false })
    .action(async (root: string | undefined, options: Options) => {
      const logger = baseLogger.extend("scan");
      await withContext(logger, { root, exif: options.exif }, async (ctx) => {
        const inventory = ctx.session.inventory;
        if (!inventory) return;
        const report = inventoryReport(inventory);
        await ctx.dumper.dump("scan-inventory", report);

        for (const [state, count] of Object.entries(
          countBy(inventory.pending.map((e) => e.state))
        )) {
          logger.info({ emoji: "📋", state, count })`${state}: ${count}`;
        }
        for (const warning of inventory.warnings) {
          logger.warn({ path: warning.path })`${warning.message}`;
        }
        if (inventory.conflicts.length > 0) {
          logger.warn({
            emoji: "⚠️",
          })`有 ${inventory.conflicts.length} 個檔案同時存在於多個資料夾，請執行 conflicts 檢視`;
        }
        logger.info({
          emoji: "✅",
        })`共 ${inventory.pending.length} 個待整理檔案`;
      });
    });
}

function countBy(values: string[]) {
  const counts: Record<string, number> = {};
  for (const v of values) counts[v] = (counts[v] ?? 0) + 1;
  return counts;
}
