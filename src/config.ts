import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "~shared/ConfigFactory";

export const appConfigSchema = t.Object({
  /** JSON 報告輸出目錄 */
  REPORT_DIR: t.String({ default: "reports" }),
  FFPROBE_PATH: t.String({ default: "ffprobe" }),
  /** arrange 未指定 --target 時的輸出根目錄 */
  TARGET_ROOT: t.String({ default: "~/pictures/snapdate" }),
});

export type AppConfig = typeof appConfigSchema.static;

export const getAppConfig = buildConfigFactoryEnv(appConfigSchema);
