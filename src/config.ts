import { Type as t } from "@sinclair/typebox";
import path from "node:path";

import { buildConfigFactoryEnv } from "~shared/ConfigFactory";

import { expandHome } from "@/utils/helper";

const getRawConfig = buildConfigFactoryEnv(
  t.Object({
    /** config.json、edits.json、ignore.json 存放處 */
    CAMERA_ORGANIZER_STATE_DIR: t.String({ default: "~/.camera-organizer" }),
    /** 未設定時為 STATE_DIR/trash */
    CAMERA_ORGANIZER_TRASH_DIR: t.Optional(t.String()),
    CAMERA_ORGANIZER_DUMP_DIR: t.String({ default: "dist/reports" }),
  })
);

export type AppConfig = {
  stateDir: string;
  trashDir: string;
  dumpDir: string;
  configFile: string;
  editsFile: string;
  ignoreFile: string;
};

export function getAppConfig(): AppConfig {
  const raw = getRawConfig();
  const stateDir = expandHome(raw.CAMERA_ORGANIZER_STATE_DIR);
  return {
    stateDir,
    trashDir: expandHome(
      raw.CAMERA_ORGANIZER_TRASH_DIR ?? path.join(stateDir, "trash")
    ),
    dumpDir: expandHome(raw.CAMERA_ORGANIZER_DUMP_DIR),
    configFile: path.join(stateDir, "config.json"),
    editsFile: path.join(stateDir, "edits.json"),
    ignoreFile: path.join(stateDir, "ignore.json"),
  };
}
