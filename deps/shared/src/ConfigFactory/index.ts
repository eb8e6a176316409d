import { type Static, type TObject, Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly path: string
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/** 環境變數的布林值，接受 true/false/1/0 */
export function envBoolean() {
  return t.Boolean();
}

/** 環境變數的數值 */
export function envNumber(options?: { minimum?: number; maximum?: number }) {
  return t.Number(options);
}

type EnvSource = Record<string, string | undefined>;

/**
 * 依 schema 驗證環境變數並快取結果。
 * 字串會先經 `Value.Convert` 轉型，再套用 schema 上的 default。
 */
export function buildConfigFactoryEnv<T extends TObject>(
  schema: T,
  options?: { env?: EnvSource }
) {
  let cached: Static<T> | undefined;
  return (refresh = false): Static<T> => {
    if (cached && !refresh) return cached;
    const source: EnvSource = { ...(options?.env ?? process.env) };
    const value = Value.Default(schema, Value.Convert(schema, source));
    if (!Value.Check(schema, value)) {
      const first = Value.Errors(schema, value).First();
      throw new ConfigError(
        `環境變數設定錯誤 ${first?.path ?? ""}: ${first?.message ?? "unknown"}`,
        first?.path ?? ""
      );
    }
    cached = value;
    return value;
  };
}
