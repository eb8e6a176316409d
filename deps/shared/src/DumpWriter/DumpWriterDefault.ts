import { format } from "date-fns";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";

import type { DumpWriter } from "./DumpWriter";

export class DumpWriterDefault implements DumpWriter {
  private readonly logger: Logger;
  private readonly dir: string;

  constructor(logger: Logger, dir = "dist/dumps") {
    this.logger = logger.extend("dump");
    this.dir = dir;
  }

  async dump(name: string, data: unknown): Promise<string> {
    await mkdir(this.dir, { recursive: true });
    const fileName = `${format(new Date(), "yyyyMMdd-HHmmss-SSS")}-${name}.json`;
    const filePath = path.join(this.dir, fileName);
    await writeFile(filePath, JSON.stringify(data, null, 2), "utf-8");
    this.logger.info({ emoji: "📝", file: filePath })`已輸出報告 ${name}`;
    return filePath;
  }
}
