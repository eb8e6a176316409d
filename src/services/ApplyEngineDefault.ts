import path from "node:path";

import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { maxCollisionAttempts } from "@/constants";
import type { PlannedMove, PlannedTrash } from "@/types";
import { errorMessage, withNumericSuffix } from "@/utils/helper";

import type {
  ApplyEngine,
  ApplyEntryResult,
  ApplyReport,
  ApplySummary,
} from "./ApplyEngine";
import type { EditSessionStore } from "./EditSessionStore";
import type { FileMover } from "./FileMover";
import { kindOf } from "./PathClassifierDefault";
import type { TrashService } from "./TrashService";
import type { VideoFrameCache } from "./VideoFrameCache";

export class ApplyEngineDefault implements ApplyEngine {
  private readonly mover: FileMover;
  private readonly trash: TrashService;
  private readonly sessionStore?: EditSessionStore;
  private readonly frameCache?: VideoFrameCache;
  private readonly logger: Logger;

  constructor(deps: {
    mover: FileMover;
    trash: TrashService;
    sessionStore?: EditSessionStore;
    frameCache?: VideoFrameCache;
    logger: Logger;
  }) {
    this.mover = deps.mover;
    this.trash = deps.trash;
    this.sessionStore = deps.sessionStore;
    this.frameCache = deps.frameCache;
    this.logger = deps.logger.extend("ApplyEngineDefault");
  }

  async apply({
    moves,
    trashes,
  }: {
    moves: PlannedMove[];
    trashes: PlannedTrash[];
  }): Promise<ApplyReport> {
    const logger = this.logger.extend("apply");
    const total = moves.length + trashes.length;
    logger.info({
      event: "start",
      moves: moves.length,
      trashes: trashes.length,
    })`開始套用 ${total} 個項目`;

    // 逐一處理，不並行
    const results: ApplyEntryResult[] = [];
    const done: string[] = [];
    for (const move of moves) {
      const result = await this.applyMove(move);
      results.push(result);
      if (result.status === "success") done.push(move.identity);
    }
    for (const item of trashes) {
      const result = await this.applyTrash(item);
      results.push(result);
      // 多餘副本不是待整理檔案，沒有對應的編輯紀錄
      if (result.status === "success" && item.reason !== "redundant-copy") {
        done.push(item.identity);
      }
    }

    for (const r of results) {
      if (r.status === "failed") {
        logger.warn({ from: r.from, reason: r.reason })`失敗: ${r.message}`;
      }
    }

    const summary: ApplySummary = {
      succeeded: results.filter((r) => r.status === "success").length,
      skipped: results.filter((r) => r.status === "skipped").length,
      failed: results.filter((r) => r.status === "failed").length,
    };
    const report: ApplyReport = { results, summary };

    const sessionWarning = await this.forgetEdits(done);
    if (sessionWarning) {
      report.sessionWarning = sessionWarning;
      logger.error({ emoji: "⚠️" })`${sessionWarning}`;
    }

    logger.info({
      event: "done",
      ...summary,
    })`完成：成功 ${summary.succeeded}、略過 ${summary.skipped}、失敗 ${summary.failed}`;
    return report;
  }

  private async applyMove(move: PlannedMove): Promise<ApplyEntryResult> {
    const base = {
      identity: move.identity,
      action: "move" as const,
      from: move.from,
    };
    try {
      if (!(await this.mover.exists(move.from))) {
        return {
          ...base,
          status: "skipped",
          reason: "SOURCE_MISSING",
          message: `來源檔案已不存在: ${move.from}`,
        };
      }

      // 計畫產生後目標位置可能已有檔案，重新找一個可用名稱
      let dest = move.to;
      let renamed = move.renamed;
      if (await this.mover.exists(dest)) {
        const free = await this.findFreeName(move);
        if (!free) {
          return {
            ...base,
            status: "failed",
            reason: "COLLISION_UNRESOLVED",
            message: `找不到可用的檔名: ${move.to}`,
          };
        }
        dest = free;
        renamed = true;
      }

      await this.mover.ensureDir(path.dirname(dest));
      await this.mover.move(move.from, dest);
      await this.purgeFrames(move.from);
      return { ...base, status: "success", to: dest, renamed };
    } catch (e) {
      return {
        ...base,
        status: "failed",
        reason: "MOVE_FAILED",
        message: errorMessage(e),
      };
    }
  }

  private async findFreeName(move: PlannedMove) {
    const dir = path.dirname(move.to);
    for (let n = 1; n <= maxCollisionAttempts; n++) {
      const candidate = path.join(dir, withNumericSuffix(move.identity, n));
      if (!(await this.mover.exists(candidate))) return candidate;
    }
    return null;
  }

  private async applyTrash(item: PlannedTrash): Promise<ApplyEntryResult> {
    const base = {
      identity: item.identity,
      action: "trash" as const,
      from: item.from,
    };
    const result = await this.trash.moveToTrash(item.from);
    if (isErr(result)) {
      const missing = result.error.type === "SOURCE_MISSING";
      return {
        ...base,
        status: missing ? "skipped" : "failed",
        reason: missing ? "SOURCE_MISSING" : "TRASH_FAILED",
        message: result.error.message,
      };
    }
    await this.purgeFrames(item.from);
    return { ...base, status: "success", to: result.value };
  }

  private async purgeFrames(sourcePath: string) {
    if (!this.frameCache || kindOf(sourcePath) !== "video") return;
    try {
      await this.frameCache.purge(sourcePath);
    } catch (e) {
      // 清除失敗不算搬移失敗
      this.logger.warn({ error: e })`無法清除影片截圖快取: ${sourcePath}`;
    }
  }

  private async forgetEdits(identities: string[]) {
    if (!this.sessionStore || identities.length === 0) return undefined;
    const loaded = await this.sessionStore.load();
    if (isErr(loaded)) return `無法更新編輯紀錄: ${loaded.error.message}`;
    const session = loaded.value;
    let changed = false;
    for (const identity of identities) {
      changed = session.delete(identity) || changed;
    }
    if (!changed) return undefined;
    const saved = await this.sessionStore.save(session);
    if (isErr(saved)) return `無法更新編輯紀錄: ${saved.error.message}`;
    return undefined;
  }
}
