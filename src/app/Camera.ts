import type { CAC } from "cac";
import path from "node:path";

import type { Logger } from "~shared/Logger";

import { getAppConfig } from "@/config";
import { exists, expandHome } from "@/utils/helper";

import { CommandError, resolveRoot } from "./context";

export function registerCamera(cli: CAC, baseLogger: Logger) {
  cli
    .command("camera [path]", "顯示或設定預設的相機資料夾")
    .action(async (target: string | undefined) => {
      const logger = baseLogger.extend("camera");
      const config = getAppConfig();
      if (!target) {
        const current = await resolveRoot(config);
        logger.info({ emoji: "📷" })`目前的相機資料夾: ${current}`;
        return;
      }
      const absolute = path.resolve(expandHome(target));
      if (!(await exists(absolute))) {
        throw new CommandError(`找不到資料夾: ${absolute}`);
      }
      await resolveRoot(config, absolute);
      logger.info({ emoji: "✅" })`已設定相機資料夾: ${absolute}`;
    });
}
