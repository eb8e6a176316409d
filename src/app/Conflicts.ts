import type { CAC } from "cac";

import type { Logger } from "~shared/Logger";

import { withContext } from "./context";

type Options = {
  root?: string;
  all?: boolean;
};

export function registerConflicts(cli: CAC, baseLogger: Logger) {
  cli
    .command("conflicts [root]", "列出同時存在於多個已整理資料夾的檔案")
    .option("--all", "包含已忽略的檔案", { default: false })
    .action(async (root: string | undefined, options: Options) => {
      const logger = baseLogger.extend("conflicts");
      await withContext(logger, { root }, async (ctx) => {
        const conflicts = ctx.session.conflicts({
          includeIgnored: options.all,
        });
        await ctx.dumper.dump("conflicts", conflicts);
        if (conflicts.length === 0) {
          logger.info({ emoji: "✅" })`沒有衝突`;
          return;
        }
        for (const conflict of conflicts) {
          const ignored = ctx.session.ignored.has(conflict.identity);
          const folders = conflict.folders
            .map((f) => `${f.year}/${f.name}`)
            .join(", ");
          logger.warn({
            emoji: ignored ? "🙈" : "⚠️",
          })`${conflict.identity}: ${folders}`;
        }
      });
    });
}
