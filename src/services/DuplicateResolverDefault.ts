import path from "node:path";

import type { FileEntry, FolderRef } from "@/types";
import { deriveState } from "@/utils/entryState";

import type {
  DuplicateResolver,
  ResolveInput,
  ResolveResult,
} from "./DuplicateResolver";

export function compareFolderRef(a: FolderRef, b: FolderRef) {
  return a.year !== b.year ? a.year - b.year : a.name.localeCompare(b.name);
}

function toRef({ year, name, path }: FolderRef): FolderRef {
  return { year, name, path };
}

function indexMembers(
  folders: Array<FolderRef & { memberIdentities: string[] }>
) {
  const index = new Map<string, FolderRef[]>();
  for (const folder of [...folders].sort(compareFolderRef)) {
    for (const identity of new Set(folder.memberIdentities)) {
      if (!index.has(identity)) index.set(identity, []);
      index.get(identity)?.push(toRef(folder));
    }
  }
  return index;
}

export class DuplicateResolverDefault implements DuplicateResolver {
  resolve({
    pending,
    organizedFolders,
    categoryFolders,
    ignoreList,
  }: ResolveInput): ResolveResult {
    const organizedIndex = indexMembers(organizedFolders);
    const categoryIndex = indexMembers(categoryFolders);

    // 忽略清單只影響衝突回報，重複檔案照樣移到重複區
    const entries = pending.map((entry) =>
      this.annotate(entry, organizedIndex, categoryIndex)
    );

    const conflicts: ResolveResult["conflicts"] = [];
    const ignoredConflicts: ResolveResult["ignoredConflicts"] = [];
    const identities = [...organizedIndex.keys()].sort((a, b) =>
      a.localeCompare(b)
    );
    for (const identity of identities) {
      const folders = organizedIndex.get(identity) ?? [];
      if (folders.length < 2) continue;
      const conflict = { identity, folders };
      if (ignoreList.has(identity)) ignoredConflicts.push(conflict);
      else conflicts.push(conflict);
    }

    const redundantCategoryCopies: ResolveResult["redundantCategoryCopies"] =
      [];
    for (const folder of [...categoryFolders].sort(compareFolderRef)) {
      for (const identity of folder.memberIdentities) {
        const keptIn = organizedIndex.get(identity);
        if (!keptIn || ignoreList.has(identity)) continue;
        redundantCategoryCopies.push({
          identity,
          path: path.join(folder.path, identity),
          keptIn,
        });
      }
    }
    redundantCategoryCopies.sort(
      (a, b) =>
        a.identity.localeCompare(b.identity) || a.path.localeCompare(b.path)
    );

    return { entries, conflicts, ignoredConflicts, redundantCategoryCopies };
  }

  private annotate(
    entry: FileEntry,
    organizedIndex: Map<string, FolderRef[]>,
    categoryIndex: Map<string, FolderRef[]>
  ): FileEntry {
    const { duplicateAction, duplicateOf, ...base } = entry;
    const refs = [
      ...(organizedIndex.get(entry.identity) ?? []),
      ...(categoryIndex.get(entry.identity) ?? []),
    ].sort(compareFolderRef);

    if (refs.length === 0) {
      // 先前標記的重複狀態可能已失效（例如已整理的那份被刪除）
      return { ...base, state: deriveState({ ...base, state: "unorganized" }) };
    }
    return {
      ...base,
      state: "duplicate",
      // 截圖重複價值低，直接送回收區
      duplicateAction: entry.category === "screenshot" ? "trash" : "relocate",
      duplicateOf: refs,
    };
  }
}
