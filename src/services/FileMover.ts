export interface FileMover {
  exists(p: string): Promise<boolean>;
  /** 等同 mkdir -p，重複呼叫無副作用 */
  ensureDir(dir: string): Promise<void>;
  move(from: string, to: string): Promise<void>;
}
