import type { Dirent } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, isOk, ok } from "~shared/utils/Result";

import {
  duplicateFolderName,
  reservedPrefix,
  screenRecorderFolderPrefix,
  screenshotFolderPrefix,
  yearFolderPattern,
} from "@/constants";
import type { DuplicateResolver } from "@/services/DuplicateResolver";
import type { ExifService } from "@/services/ExifService";
import type { PathClassifier } from "@/services/PathClassifier";
import type {
  AutoCategory,
  CategoryFolder,
  FileEntry,
  Inventory,
  OrganizedFolder,
  ScanWarning,
} from "@/types";
import { deriveState } from "@/utils/entryState";
import { colorTagOf } from "@/utils/folderColor";
import { errorMessage, isErrnoException } from "@/utils/helper";

import type {
  InventoryScanner,
  ScanError,
  ScanOptions,
} from "./InventoryScanner";

type ScanState = {
  organizedFolders: OrganizedFolder[];
  categoryFolders: CategoryFolder[];
  warnings: ScanWarning[];
};

function byName(a: Dirent, b: Dirent) {
  return a.name.localeCompare(b.name);
}

function isHidden(name: string) {
  return name.startsWith(".");
}

function categoryOfFolder(name: string): AutoCategory | null {
  if (name.startsWith(screenshotFolderPrefix)) return "screenshot";
  if (name.startsWith(screenRecorderFolderPrefix)) return "screen-recording";
  return null;
}

export class InventoryScannerDefault implements InventoryScanner {
  private readonly classifier: PathClassifier;
  private readonly resolver: DuplicateResolver;
  private readonly exifService?: ExifService;
  private readonly logger: Logger;

  constructor(deps: {
    classifier: PathClassifier;
    resolver: DuplicateResolver;
    exifService?: ExifService;
    logger: Logger;
  }) {
    this.classifier = deps.classifier;
    this.resolver = deps.resolver;
    this.exifService = deps.exifService;
    this.logger = deps.logger.extend("InventoryScanner");
  }

  async scan(
    rootPath: string,
    options: ScanOptions = {}
  ): Promise<Result<Inventory, ScanError>> {
    const root = path.resolve(rootPath);
    const logger = this.logger.extend("scan", { root });

    const rootCheck = await this.checkRoot(root);
    if (!rootCheck.ok) return rootCheck;

    let rootDirents: Dirent[];
    try {
      rootDirents = (await readdir(root, { withFileTypes: true })).sort(byName);
    } catch (e) {
      return err({
        type: "SCAN_FAILED",
        message: `無法讀取相機資料夾 ${root}: ${errorMessage(e)}`,
      });
    }

    logger.info({ emoji: "🔎", event: "start" })`開始掃描 ${root}`;

    const state: ScanState = {
      organizedFolders: [],
      categoryFolders: [],
      warnings: [],
    };
    const pending: FileEntry[] = [];
    let duplicateArea: string[] = [];

    for (const dirent of rootDirents) {
      if (isHidden(dirent.name)) continue;
      const fullPath = path.join(root, dirent.name);
      if (dirent.isFile()) {
        const entry = this.toEntry(dirent.name, fullPath);
        if (entry) pending.push(entry);
        continue;
      }
      if (!dirent.isDirectory()) continue;
      if (dirent.name === duplicateFolderName) {
        duplicateArea = await this.listFiles(fullPath, state.warnings);
      } else if (yearFolderPattern.test(dirent.name)) {
        await this.scanYear(fullPath, Number(dirent.name), state);
      }
      // 其他資料夾（含 !tempvideoscreen）不在整理範圍內
    }

    if (options.exifFallback) {
      await this.fillYearFromExif(pending, logger);
    }

    pending.sort(
      (a, b) =>
        (a.capturedAt?.getTime() ?? -Infinity) -
          (b.capturedAt?.getTime() ?? -Infinity) ||
        a.identity.localeCompare(b.identity)
    );

    const resolved = this.resolver.resolve({
      pending,
      organizedFolders: state.organizedFolders,
      categoryFolders: state.categoryFolders,
      ignoreList: options.ignoreList ?? new Set(),
    });

    const inventory: Inventory = {
      root,
      scannedAt: new Date(),
      pending: resolved.entries,
      organizedFolders: state.organizedFolders,
      categoryFolders: state.categoryFolders,
      duplicateArea,
      conflicts: resolved.conflicts,
      ignoredConflicts: resolved.ignoredConflicts,
      redundantCategoryCopies: resolved.redundantCategoryCopies,
      warnings: state.warnings,
    };

    for (const warning of state.warnings) {
      logger.warn({ path: warning.path })`略過無法讀取的資料夾: ${warning.message}`;
    }
    logger.info({
      event: "done",
      pending: inventory.pending.length,
      duplicates: resolved.entries.filter((e) => e.state === "duplicate")
        .length,
      conflicts: inventory.conflicts.length,
    })`掃描完成，共 ${inventory.pending.length} 個待整理檔案、${inventory.organizedFolders.length} 個已整理資料夾`;

    return ok(inventory);
  }

  private async checkRoot(root: string): Promise<Result<null, ScanError>> {
    try {
      const s = await stat(root);
      if (!s.isDirectory()) {
        return err({
          type: "ROOT_NOT_DIRECTORY",
          message: `不是資料夾: ${root}`,
        });
      }
      return ok(null);
    } catch (e) {
      if (isErrnoException(e) && e.code === "ENOENT") {
        return err({
          type: "ROOT_NOT_FOUND",
          message: `相機資料夾不存在: ${root}`,
        });
      }
      return err({ type: "SCAN_FAILED", message: errorMessage(e) });
    }
  }

  private toEntry(filename: string, fullPath: string): FileEntry | null {
    const { year, category, kind, capturedAt } =
      this.classifier.classify(filename);
    if (kind === "other") return null;
    const base = {
      identity: filename,
      sourcePath: fullPath,
      kind,
      year,
      yearSource: year !== null ? ("filename" as const) : null,
      capturedAt,
      category,
      assignedFolder: null,
    };
    return { ...base, state: deriveState({ ...base, state: "unorganized" }) };
  }

  private async scanYear(yearPath: string, year: number, state: ScanState) {
    let dirents: Dirent[];
    try {
      dirents = (await readdir(yearPath, { withFileTypes: true })).sort(byName);
    } catch (e) {
      state.warnings.push({ path: yearPath, message: errorMessage(e) });
      return;
    }

    for (const dirent of dirents) {
      if (!dirent.isDirectory() || isHidden(dirent.name)) continue;
      const folderPath = path.join(yearPath, dirent.name);
      const category = categoryOfFolder(dirent.name);
      if (category === null && dirent.name.startsWith(reservedPrefix)) {
        continue;
      }
      const memberIdentities = await this.listFiles(folderPath, state.warnings);
      const ref = { year, name: dirent.name, path: folderPath };
      if (category) {
        state.categoryFolders.push({ ...ref, category, memberIdentities });
      } else {
        state.organizedFolders.push({
          ...ref,
          colorTag: colorTagOf(dirent.name),
          memberIdentities,
        });
      }
    }
  }

  private async listFiles(dir: string, warnings: ScanWarning[]) {
    try {
      const dirents = await readdir(dir, { withFileTypes: true });
      return dirents
        .filter((d) => d.isFile() && !isHidden(d.name))
        .map((d) => d.name)
        .sort((a, b) => a.localeCompare(b));
    } catch (e) {
      warnings.push({ path: dir, message: errorMessage(e) });
      return [];
    }
  }

  private async fillYearFromExif(pending: FileEntry[], logger: Logger) {
    const exifService = this.exifService;
    if (!exifService) {
      logger.warn("未提供 EXIF 服務，略過年份推斷");
      return;
    }
    for (const entry of pending) {
      if (entry.year !== null) continue;
      const result = await exifService.readCaptureTime(entry.sourcePath);
      if (!isOk(result)) {
        logger.debug({ error: result.error })`無法由 EXIF 推斷年份: ${entry.identity}`;
        continue;
      }
      entry.year = result.value.getFullYear();
      entry.yearSource = "exif";
      entry.capturedAt = result.value;
      entry.state = deriveState(entry);
    }
  }
}
