import type { CAC } from "cac";

import type { Logger } from "~shared/Logger";

import { unwrap, withContext } from "./context";

type Options = {
  root?: string;
  remove?: boolean;
};

export function registerIgnore(cli: CAC, baseLogger: Logger) {
  cli
    .command("ignore <...files>", "將檔名加入忽略清單，不再視為重複或衝突")
    .option("--root <root>", "相機資料夾，未指定時使用已設定的資料夾")
    .option("--remove", "從忽略清單移除", { default: false })
    .action(async (files: string[], options: Options) => {
      const logger = baseLogger.extend("ignore");
      await withContext(logger, { root: options.root }, async (ctx) => {
        if (options.remove) {
          unwrap(await ctx.session.unignore(files));
          logger.info({ emoji: "👀" })`已從忽略清單移除 ${files.length} 個檔名`;
        } else {
          unwrap(await ctx.session.ignore(files));
          logger.info({ emoji: "🙈" })`已忽略 ${files.length} 個檔名`;
        }
      });
    });
}
