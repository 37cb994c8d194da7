import {
  type Static,
  type TBoolean,
  type TObject,
  type TProperties,
  type TSchema,
  Type as t,
} from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: { path: string; message: string }[]
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/** 環境變數中的布林值，接受 true/false/1/0 */
export function envBoolean(options?: { default?: boolean }): TBoolean {
  return t.Boolean(options);
}

/**
 * 以 TypeBox schema 建立設定讀取函式。
 * 讀取順序：預設值 → 型別轉換 → 驗證，不合法時拋出 ConfigError。
 */
export function buildConfigFactory<T extends TProperties>(
  schema: TObject<T>,
  source: () => Record<string, unknown>
): () => Static<TObject<T>> {
  return () => parseConfig(schema, source());
}

export function buildConfigFactoryEnv<T extends TProperties>(
  schema: TObject<T>
): () => Static<TObject<T>> {
  return buildConfigFactory(schema, () => ({ ...process.env }));
}

export function parseConfig<S extends TSchema>(
  schema: S,
  raw: Record<string, unknown>
): Static<S> {
  const picked = pickEmptyAsMissing(raw);
  const converted = Value.Convert(schema, Value.Default(schema, picked));
  if (Value.Check(schema, converted)) return converted;

  const issues = [...Value.Errors(schema, converted)].map((e) => ({
    path: e.path,
    message: e.message,
  }));
  throw new ConfigError(
    `設定值不合法: ${issues.map((i) => `${i.path} ${i.message}`).join("; ")}`,
    issues
  );
}

function pickEmptyAsMissing(raw: Record<string, unknown>) {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === "" || value === undefined) continue;
    result[key] = value;
  }
  return result;
}
