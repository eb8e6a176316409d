import path from "node:path";

import type { DumpWriter } from "~shared/DumpWriter/DumpWriter";
import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { type Result, isErr } from "~shared/utils/Result";

import { type AppConfig, getAppConfig } from "@/config";
import { ApplyEngineDefault } from "@/services/ApplyEngineDefault";
import { CameraConfigStoreJson } from "@/services/CameraConfigStore";
import { DuplicateResolverDefault } from "@/services/DuplicateResolverDefault";
import { EditSessionStoreJson } from "@/services/EditSessionStoreJson";
import { ExifServiceExifTool } from "@/services/ExifService";
import { FileMoverNode } from "@/services/FileMoverNode";
import { IgnoreListStoreJson } from "@/services/IgnoreListStoreJson";
import { InventoryScannerDefault } from "@/services/InventoryScanner";
import { OrganizerSession } from "@/services/OrganizerSession";
import { PathClassifierDefault } from "@/services/PathClassifierDefault";
import { PlacementPlannerDefault } from "@/services/PlacementPlannerDefault";
import { TrashServiceFolder } from "@/services/TrashServiceFolder";
import { VideoFrameCache } from "@/services/VideoFrameCache";
import { expandHome } from "@/utils/helper";

export class CommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CommandError";
  }
}

export type OrganizerContext = {
  config: AppConfig;
  root: string;
  session: OrganizerSession;
  dumper: DumpWriter;
};

/** 未指定時使用上次記住的相機資料夾 */
export async function resolveRoot(config: AppConfig, root?: string) {
  const store = new CameraConfigStoreJson(config.configFile);
  if (root) {
    const resolved = path.resolve(expandHome(root));
    const saved = await store.write({ cameraPath: resolved });
    if (isErr(saved)) throw new CommandError(saved.error.message);
    return resolved;
  }
  const loaded = await store.read();
  if (isErr(loaded)) throw new CommandError(loaded.error.message);
  if (!loaded.value.cameraPath) {
    throw new CommandError("尚未設定相機資料夾，請指定路徑或執行 camera <path>");
  }
  return loaded.value.cameraPath;
}

/**
 * 組裝服務、開啟工作階段並完成第一次掃描後執行 fn。
 * 指定 exif 時才啟動 exiftool，結束後關閉。
 */
export async function withContext<T>(
  logger: Logger,
  options: { root?: string; exif?: boolean },
  fn: (ctx: OrganizerContext) => Promise<T>
): Promise<T> {
  const config = getAppConfig();
  const root = await resolveRoot(config, options.root);
  const exifService = options.exif ? new ExifServiceExifTool() : undefined;
  try {
    const session = await openSession(logger, config, root, exifService);
    return await fn({
      config,
      root,
      session,
      dumper: new DumpWriterDefault(logger, config.dumpDir),
    });
  } finally {
    if (exifService) await exifService[Symbol.asyncDispose]();
  }
}

async function openSession(
  logger: Logger,
  config: AppConfig,
  root: string,
  exifService: ExifServiceExifTool | undefined
) {
  const resolver = new DuplicateResolverDefault();
  const editStore = new EditSessionStoreJson(config.editsFile);

  const session = new OrganizerSession({
    root,
    scanner: new InventoryScannerDefault({
      classifier: new PathClassifierDefault(),
      resolver,
      exifService,
      logger,
    }),
    resolver,
    planner: new PlacementPlannerDefault(),
    applyEngine: new ApplyEngineDefault({
      mover: new FileMoverNode(),
      trash: new TrashServiceFolder({ trashRoot: config.trashDir, logger }),
      sessionStore: editStore,
      frameCache: new VideoFrameCache(root),
      logger,
    }),
    editStore,
    ignoreStore: new IgnoreListStoreJson(config.ignoreFile),
    logger,
  });

  const opened = await session.open();
  if (isErr(opened)) throw new CommandError(opened.error.message);
  const scanned = await session.scan({ exifFallback: !!exifService });
  if (isErr(scanned)) throw new CommandError(scanned.error.message);
  return session;
}

/** 將 Result 錯誤轉為命令錯誤 */
export function unwrap<T>(result: Result<T, { message: string }>): T {
  if (isErr(result)) throw new CommandError(result.error.message);
  return result.value;
}

/** cac 會把數字字串轉成 number，也可能是重複指定的陣列 */
export function toYear(value: unknown): number | null | undefined {
  if (value === undefined) return undefined;
  if (value === "none") return null;
  const n = typeof value === "number" ? value : Number(value);
  if (!Number.isInteger(n)) throw new CommandError(`年份格式錯誤: ${value}`);
  return n;
}
