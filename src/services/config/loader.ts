/**
 * 配置加载
 *
 * 每次运行前重新读取，返回冻结的快照
 */

import { readFile } from "node:fs/promises";
import type { ZodIssue } from "zod";
import { ConfigError } from "@/lib/errors";
import type { GlobalConfig, PluginConfig } from "@/types/notecast";
import { globalConfigSchema } from "./schema";

// 按 zod issue 的 path 取出原始输入里的值
const valueAt = (raw: unknown, path: ReadonlyArray<string | number>): unknown =>
  path.reduce<unknown>(
    (node, key) => (typeof node === "object" && node !== null ? Reflect.get(node, key) : undefined),
    raw,
  );

const formatIssue = (issue: ZodIssue) =>
  issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;

export function parseConfig(raw: unknown): GlobalConfig {
  const result = globalConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const [first] = result.error.issues;
    throw new ConfigError(
      `Invalid configuration: ${result.error.issues.map(formatIssue).join("; ")}`,
      first?.path.join("."),
      first ? valueAt(raw, first.path) : undefined,
      { cause: result.error },
    );
  }

  const { refresh_rate, plugins, anki_connect_url, anki_connect_key } = result.data;
  const snapshot: GlobalConfig = {
    refresh_rate,
    plugins: Object.freeze(
      plugins.map((plugin): PluginConfig =>
        Object.freeze({ ...plugin, visible_fields: Object.freeze([...plugin.visible_fields]) }),
      ),
    ),
    anki_connect_url,
    ...(anki_connect_key ? { anki_connect_key } : {}),
  };
  return Object.freeze(snapshot);
}

export async function loadConfig(configPath: string): Promise<GlobalConfig> {
  let text: string;
  try {
    text = await readFile(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError("Config file could not be read", "path", configPath, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError("Config file is not valid JSON", "path", configPath, { cause: error });
  }
  return parseConfig(raw);
}

export function refreshIntervalMs(config: GlobalConfig): number {
  return config.refresh_rate * 1000;
}
