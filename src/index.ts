#!/usr/bin/env -S npx tsx
import { cac } from "cac";

import { createDefaultLoggerFromEnv } from "~shared/Logger";

import { registerApply } from "./app/Apply";
import { registerAssign } from "./app/Assign";
import { registerCamera } from "./app/Camera";
import { registerCleanCategoryCopies } from "./app/CleanCategoryCopies";
import { registerConflicts } from "./app/Conflicts";
import { registerDelete } from "./app/Delete";
import { registerIgnore } from "./app/Ignore";
import { registerPlan } from "./app/Plan";
import { registerScan } from "./app/Scan";

const logger = createDefaultLoggerFromEnv();
const cli = cac("camera-organizer");

registerCamera(cli, logger);
registerScan(cli, logger);
registerAssign(cli, logger);
registerPlan(cli, logger);
registerApply(cli, logger);
registerConflicts(cli, logger);
registerIgnore(cli, logger);
registerDelete(cli, logger);
registerCleanCategoryCopies(cli, logger);

cli.help();
cli.parse(process.argv, { run: false });

if (!cli.matchedCommand) {
  cli.outputHelp();
  process.exit(0);
}

try {
  await cli.runMatchedCommand();
} catch (error) {
  logger.error({ error }, "執行命令時發生錯誤");
  process.exit(1);
}
