import { Type as t } from "@sinclair/typebox";
import { describe, expect, test } from "vitest";

import {
  ConfigError,
  buildConfigFactory,
  envBoolean,
} from "~shared/ConfigFactory";

const schema = t.Object({
  REPORT_DIR: t.String({ default: "reports" }),
  RETRY: t.Number({ default: 3 }),
  DRY_RUN: t.Optional(envBoolean()),
  LOG_FILE: t.Optional(t.String()),
});

describe("buildConfigFactory", () => {
  test("缺少的值套用預設值，空字串視為未設定", () => {
    const getConfig = buildConfigFactory(schema, () => ({
      REPORT_DIR: "",
      UNRELATED: "x",
    }));
    const config = getConfig();
    expect(config.REPORT_DIR).toBe("reports");
    expect(config.RETRY).toBe(3);
    expect(config.DRY_RUN).toBeUndefined();
    expect(config.LOG_FILE).toBeUndefined();
  });

  test("環境變數字串轉換為數字與布林", () => {
    const getConfig = buildConfigFactory(schema, () => ({
      RETRY: "5",
      DRY_RUN: "true",
      LOG_FILE: "logs/app.log",
    }));
    expect(getConfig()).toMatchObject({
      REPORT_DIR: "reports",
      RETRY: 5,
      DRY_RUN: true,
      LOG_FILE: "logs/app.log",
    });
  });

  test("envBoolean 接受 1 與 0", () => {
    let value = "1";
    const getConfig = buildConfigFactory(schema, () => ({ DRY_RUN: value }));
    expect(getConfig().DRY_RUN).toBe(true);
    value = "0";
    expect(getConfig().DRY_RUN).toBe(false);
  });

  test("每次呼叫重新讀取來源", () => {
    let retry = "1";
    const getConfig = buildConfigFactory(schema, () => ({ RETRY: retry }));
    expect(getConfig().RETRY).toBe(1);
    retry = "2";
    expect(getConfig().RETRY).toBe(2);
  });

  test("無法轉換的值拋出 ConfigError 並列出欄位", () => {
    const getConfig = buildConfigFactory(schema, () => ({ RETRY: "many" }));
    let thrown: unknown;
    try {
      getConfig();
    } catch (error) {
      thrown = error;
    }
    expect(thrown).toBeInstanceOf(ConfigError);
    if (!(thrown instanceof ConfigError)) return;
    expect(thrown.issues.map((i) => i.path)).toContain("/RETRY");
  });
});
