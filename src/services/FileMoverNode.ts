import { mkdir } from "node:fs/promises";

import { exists, moveFile } from "@/utils/helper";

import type { FileMover } from "./FileMover";

export class FileMoverNode implements FileMover {
  exists(p: string) {
    return exists(p);
  }

  async ensureDir(dir: string) {
    await mkdir(dir, { recursive: true });
  }

  move(from: string, to: string) {
    return moveFile(from, to);
  }
}
