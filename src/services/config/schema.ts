import { z } from "zod";

/** 远端服务限流：刷新间隔不得低于 5 分钟，负数和过小的值都按下限处理 */
export const MIN_REFRESH_RATE_SECS = 300;
export const DEFAULT_REFRESH_RATE_SECS = 600;
export const DEFAULT_SEARCH_QUERY = "deck:current";
export const DEFAULT_ANKI_CONNECT_URL = "http://127.0.0.1:8765";

const refreshRate = z
  .union([
    z.number(),
    z
      .string()
      .trim()
      .regex(/^-?\d+(\.\d+)?$/, "Expected a number of seconds")
      .transform(Number),
  ])
  .pipe(z.number().finite())
  .transform((secs) => Math.max(Math.floor(secs), MIN_REFRESH_RATE_SECS));

export const pluginConfigSchema = z.object({
  enabled: z.boolean().default(true),
  search_query: z.string().default(DEFAULT_SEARCH_QUERY),
  visible_fields: z.array(z.string()).default([]),
  webhook: z.string().default(""),
});

export const globalConfigSchema = z.object({
  refresh_rate: refreshRate.default(DEFAULT_REFRESH_RATE_SECS),
  plugins: z.array(pluginConfigSchema).default([]),
  anki_connect_url: z.string().url().default(DEFAULT_ANKI_CONNECT_URL),
  anki_connect_key: z.string().min(1).optional(),
});
