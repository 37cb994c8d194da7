export function isAsyncDisposable(value: unknown): value is AsyncDisposable {
  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.asyncDispose in value &&
    typeof value[Symbol.asyncDispose] === "function"
  );
}

/**
 * 依序釋放資源；任一項失敗不影響其餘項目，最後再把第一個錯誤拋出。
 */
export async function dispose(...targets: unknown[]): Promise<void> {
  let firstError: unknown;
  for (const target of targets) {
    if (!isAsyncDisposable(target)) continue;
    try {
      await target[Symbol.asyncDispose]();
    } catch (error) {
      firstError ??= error;
    }
  }
  if (firstError !== undefined) throw firstError;
}
