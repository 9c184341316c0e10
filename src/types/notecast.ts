/**
 * notecast 类型定义
 *
 * 配置快照、笔记、推送负载
 */

// ==================== 配置 ====================

/** 单个推送目标：一个搜索条件 + 一个 webhook */
export interface PluginConfig {
  enabled: boolean;
  /** Anki 原生搜索语法，如 `deck:Japanese is:due` */
  search_query: string;
  /** 按顺序推送的字段名 */
  visible_fields: readonly string[];
  webhook: string;
}

export interface GlobalConfig {
  /** 刷新间隔（秒），已应用下限 */
  refresh_rate: number;
  plugins: readonly PluginConfig[];
  anki_connect_url: string;
  anki_connect_key?: string;
}

// ==================== 笔记 ====================

export interface Note {
  id: number;
  modelName: string;
  tags: string[];
  fields: Record<string, string>;
}

// ==================== 负载 ====================

/** 字段值列表，顺序与 visible_fields 一致，缺失字段直接跳过 */
export type Payload = string[];

/** base64 编码的 zlib 压缩负载 */
export type CompressedBlob = string;

// ==================== 调度 ====================

export type SchedulerStatus = "idle" | "running";

export type RunTrigger = "timer" | "manual";

export type PluginOutcome = "pushed" | "no-match" | "throttled" | "failed";

export interface PluginRunResult {
  /** 在 plugins 列表中的位置 */
  index: number;
  webhook: string;
  outcome: PluginOutcome;
  noteId?: number;
  fieldCount?: number;
  error?: string;
}

export interface RunSummary {
  trigger: RunTrigger;
  startedAt: number;
  finishedAt: number;
  intervalMs: number;
  results: PluginRunResult[];
  configError: string | null;
}
