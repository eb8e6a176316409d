import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import type {
  Conflict,
  FileCategory,
  FileEntry,
  Inventory,
  Plan,
  PlannedTrash,
} from "@/types";
import { deriveState } from "@/utils/entryState";

import type { ApplyEngine, ApplyReport } from "./ApplyEngine";
import type { DuplicateResolver } from "./DuplicateResolver";
import type {
  EditRecord,
  EditSession,
  EditSessionStore,
} from "./EditSessionStore";
import type { IgnoreListStore } from "./IgnoreListStore";
import type { InventoryScanner } from "./InventoryScanner";
import type { PlacementPlanner } from "./PlacementPlanner";
import {
  occupiedPathsOf,
  validateFolderName,
} from "./PlacementPlannerDefault";

export type SessionError = {
  type:
    | "BUSY"
    | "NOT_OPENED"
    | "NOT_SCANNED"
    | "SCAN_FAILED"
    | "UNKNOWN_ENTRIES"
    | "INVALID_ASSIGNMENT"
    | "STORE_FAILED";
  message: string;
  identities?: string[];
};

export type AssignPatch = {
  folder?: string | null;
  year?: number | null;
  category?: FileCategory | null;
};

export type ApplyOutcome = {
  plan: Plan;
  report: ApplyReport;
};

type SessionDeps = {
  root: string;
  scanner: InventoryScanner;
  resolver: DuplicateResolver;
  planner: PlacementPlanner;
  applyEngine: ApplyEngine;
  editStore: EditSessionStore;
  ignoreStore: IgnoreListStore;
  logger: Logger;
};

/**
 * 單一相機資料夾的整理工作階段。
 * 持有掃描結果、編輯紀錄與忽略清單；同一時間只允許一個掃描或套用動作。
 */
export class OrganizerSession {
  private readonly deps: SessionDeps;
  private readonly logger: Logger;
  private edits: EditSession | null = null;
  private ignoreList: Set<string> = new Set();
  /** 掃描器回傳的原始結果 */
  private scanned: Inventory | null = null;
  /** 套用編輯紀錄與忽略清單後的結果 */
  private current: Inventory | null = null;
  private busy = false;
  /** 之後的重新掃描沿用第一次掃描的 EXIF 設定 */
  private exifFallback = false;

  constructor(deps: SessionDeps) {
    this.deps = deps;
    this.logger = deps.logger.extend("OrganizerSession", { root: deps.root });
  }

  get inventory(): Inventory | null {
    return this.current;
  }

  get ignored(): ReadonlySet<string> {
    return this.ignoreList;
  }

  /** 讀取編輯紀錄與忽略清單；文件損毀時中止，避免覆寫使用者的紀錄 */
  async open(): Promise<Result<void, SessionError>> {
    const edits = await this.deps.editStore.load();
    if (isErr(edits)) {
      return err({ type: "STORE_FAILED", message: edits.error.message });
    }
    const ignoreList = await this.deps.ignoreStore.load();
    if (isErr(ignoreList)) {
      return err({ type: "STORE_FAILED", message: ignoreList.error.message });
    }
    this.edits = edits.value;
    this.ignoreList = ignoreList.value;
    this.logger.debug({
      edits: this.edits.size,
      ignored: this.ignoreList.size,
    })`已載入編輯紀錄`;
    return ok();
  }

  scan(options?: {
    exifFallback?: boolean;
  }): Promise<Result<Inventory, SessionError>> {
    return this.exclusive(() => this.runScan(options));
  }

  async assign(
    identities: string[],
    patch: AssignPatch
  ): Promise<Result<FileEntry[], SessionError>> {
    if (this.busy) return err(busyError());
    const ready = this.requireReady();
    if (isErr(ready)) return ready;
    const { inventory, edits } = ready.value;
    const invalid = validatePatch(patch);
    if (invalid) return err({ type: "INVALID_ASSIGNMENT", message: invalid });

    const known = new Set(inventory.pending.map((e) => e.identity));
    const unknown = identities.filter((id) => !known.has(id));
    if (unknown.length > 0) {
      return err({
        type: "UNKNOWN_ENTRIES",
        message: `找不到待整理檔案: ${unknown.join(", ")}`,
        identities: unknown,
      });
    }

    for (const identity of identities) {
      const record: EditRecord = {
        ...(edits.get(identity) ?? emptyRecord),
      };
      if (patch.folder !== undefined) {
        record.folder = patch.folder?.trim() ?? null;
      }
      if (patch.year !== undefined) record.year = patch.year;
      if (patch.category !== undefined) record.category = patch.category;
      if (
        record.folder === null &&
        record.year === null &&
        record.category === null
      ) {
        edits.delete(identity);
      } else {
        edits.set(identity, record);
      }
    }

    const saved = await this.deps.editStore.save(edits);
    if (isErr(saved)) {
      return err({ type: "STORE_FAILED", message: saved.error.message });
    }

    this.current = this.annotate(this.scanned ?? inventory);
    const wanted = new Set(identities);
    const updated = this.current.pending.filter((e) => wanted.has(e.identity));
    this.logger.info({
      emoji: "📁",
      count: updated.length,
      ...patch,
    })`已更新 ${updated.length} 個檔案的整理設定`;
    return ok(updated);
  }

  /** 預覽搬移計畫；autoOnly 只處理截圖與螢幕錄影 */
  preview(options: { autoOnly?: boolean } = {}): Result<Plan, SessionError> {
    const ready = this.requireReady();
    if (isErr(ready)) return ready;
    const { inventory } = ready.value;
    const entries = inventory.pending.filter((e) =>
      options.autoOnly
        ? e.state === "planned" && e.category !== "normal"
        : e.state === "planned" || e.state === "duplicate"
    );
    return ok(
      this.deps.planner.planBatch({
        root: inventory.root,
        entries,
        occupied: occupiedPathsOf(inventory),
      })
    );
  }

  apply(
    options: { autoOnly?: boolean } = {}
  ): Promise<Result<ApplyOutcome, SessionError>> {
    return this.exclusive(async () => {
      const plan = this.preview(options);
      if (isErr(plan)) return plan;
      const report = await this.deps.applyEngine.apply(plan.value);
      const rescanned = await this.afterMutation(report);
      if (isErr(rescanned)) return rescanned;
      return ok({ plan: plan.value, report });
    });
  }

  /** 將待整理檔案送到回收區，並移除其編輯紀錄 */
  deleteEntries(
    identities: string[]
  ): Promise<Result<ApplyReport, SessionError>> {
    return this.exclusive(async () => {
      const ready = this.requireReady();
      if (isErr(ready)) return ready;
      const byIdentity = new Map(
        ready.value.inventory.pending.map((e) => [e.identity, e])
      );
      const unknown = identities.filter((id) => !byIdentity.has(id));
      if (unknown.length > 0) {
        return err({
          type: "UNKNOWN_ENTRIES",
          message: `找不到待整理檔案: ${unknown.join(", ")}`,
          identities: unknown,
        });
      }
      const trashes: PlannedTrash[] = identities.flatMap((id) => {
        const entry = byIdentity.get(id);
        return entry
          ? [
              {
                identity: id,
                from: entry.sourcePath,
                reason: "user-delete" as const,
              },
            ]
          : [];
      });
      const report = await this.deps.applyEngine.apply({ moves: [], trashes });
      const rescanned = await this.afterMutation(report);
      if (isErr(rescanned)) return rescanned;
      return ok(report);
    });
  }

  /** 刪除截圖類資料夾中、已存在於一般資料夾的多餘副本 */
  trashRedundantCategoryCopies(): Promise<Result<ApplyReport, SessionError>> {
    return this.exclusive(async () => {
      const ready = this.requireReady();
      if (isErr(ready)) return ready;
      const trashes: PlannedTrash[] =
        ready.value.inventory.redundantCategoryCopies.map((copy) => ({
          identity: copy.identity,
          from: copy.path,
          reason: "redundant-copy" as const,
        }));
      const report = await this.deps.applyEngine.apply({ moves: [], trashes });
      const rescanned = await this.afterMutation(report);
      if (isErr(rescanned)) return rescanned;
      return ok(report);
    });
  }

  async ignore(identities: string[]): Promise<Result<void, SessionError>> {
    if (this.busy) return err(busyError());
    const next = new Set(this.ignoreList);
    for (const id of identities) next.add(id);
    return this.saveIgnoreList(next);
  }

  async unignore(identities: string[]): Promise<Result<void, SessionError>> {
    if (this.busy) return err(busyError());
    const next = new Set(this.ignoreList);
    for (const id of identities) next.delete(id);
    return this.saveIgnoreList(next);
  }

  conflicts(options: { includeIgnored?: boolean } = {}): Conflict[] {
    if (!this.current) return [];
    return options.includeIgnored
      ? [...this.current.conflicts, ...this.current.ignoredConflicts].sort(
          (a, b) => a.identity.localeCompare(b.identity)
        )
      : this.current.conflicts;
  }

  private async saveIgnoreList(
    next: Set<string>
  ): Promise<Result<void, SessionError>> {
    const saved = await this.deps.ignoreStore.save(next);
    if (isErr(saved)) {
      return err({ type: "STORE_FAILED", message: saved.error.message });
    }
    this.ignoreList = next;
    if (this.scanned) this.current = this.annotate(this.scanned);
    return ok();
  }

  private async runScan(options?: {
    exifFallback?: boolean;
  }): Promise<Result<Inventory, SessionError>> {
    if (!this.edits) {
      return err({ type: "NOT_OPENED", message: "尚未載入編輯紀錄" });
    }
    const exifFallback = options?.exifFallback ?? this.exifFallback;
    const scanned = await this.deps.scanner.scan(this.deps.root, {
      ignoreList: this.ignoreList,
      exifFallback,
    });
    if (isErr(scanned)) {
      return err({ type: "SCAN_FAILED", message: scanned.error.message });
    }
    // 掃描完成後才一次替換，不會出現半套的結果
    this.exifFallback = exifFallback;
    this.scanned = scanned.value;
    this.current = this.annotate(scanned.value);
    return ok(this.current);
  }

  private async afterMutation(
    report: ApplyReport
  ): Promise<Result<Inventory, SessionError>> {
    // 套用引擎已更新檔案中的編輯紀錄，重新載入讓記憶體內容一致
    const edits = await this.deps.editStore.load();
    if (isErr(edits)) {
      return err({ type: "STORE_FAILED", message: edits.error.message });
    }
    this.edits = edits.value;
    if (report.sessionWarning) {
      this.logger.warn({ emoji: "⚠️" })`${report.sessionWarning}`;
    }
    return this.runScan();
  }

  /** 套用編輯紀錄並重新判斷重複狀態 */
  private annotate(inventory: Inventory): Inventory {
    const edits = this.edits ?? new Map<string, EditRecord>();
    const merged = inventory.pending.map((entry) => {
      const record = edits.get(entry.identity);
      if (!record) return entry;
      const next: FileEntry = {
        ...entry,
        year: record.year ?? entry.year,
        yearSource: record.year !== null ? "user" : entry.yearSource,
        category: record.category ?? entry.category,
        assignedFolder: record.folder,
      };
      return { ...next, state: deriveState(next) };
    });
    const resolved = this.deps.resolver.resolve({
      pending: merged,
      organizedFolders: inventory.organizedFolders,
      categoryFolders: inventory.categoryFolders,
      ignoreList: this.ignoreList,
    });
    return {
      ...inventory,
      pending: resolved.entries,
      conflicts: resolved.conflicts,
      ignoredConflicts: resolved.ignoredConflicts,
      redundantCategoryCopies: resolved.redundantCategoryCopies,
    };
  }

  private requireReady(): Result<
    { inventory: Inventory; edits: EditSession },
    SessionError
  > {
    if (!this.edits) {
      return err({ type: "NOT_OPENED", message: "尚未載入編輯紀錄" });
    }
    if (!this.current) {
      return err({ type: "NOT_SCANNED", message: "請先掃描相機資料夾" });
    }
    return ok({ inventory: this.current, edits: this.edits });
  }

  private async exclusive<T>(
    fn: () => Promise<Result<T, SessionError>>
  ): Promise<Result<T, SessionError>> {
    if (this.busy) return err(busyError());
    this.busy = true;
    try {
      return await fn();
    } finally {
      this.busy = false;
    }
  }
}

const emptyRecord: EditRecord = { year: null, folder: null, category: null };

function busyError(): SessionError {
  return { type: "BUSY", message: "已有掃描或套用作業進行中" };
}

function validatePatch(patch: AssignPatch): string | null {
  if (patch.folder !== undefined && patch.folder !== null) {
    const invalid = validateFolderName(patch.folder);
    if (invalid) return invalid;
  }
  if (patch.year !== undefined && patch.year !== null) {
    const { year } = patch;
    if (!Number.isInteger(year) || year < 1900 || year > 2099) {
      return `年份必須是 1900 到 2099 之間的整數: ${patch.year}`;
    }
  }
  return null;
}
