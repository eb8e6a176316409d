export interface DumpWriter {
  /** 將資料以 JSON 輸出成報告檔，回傳檔案路徑 */
  dump(name: string, data: unknown): Promise<string>;
}
