/**
 * Scheduler Store - 定时推送
 *
 * idle -> running -> idle，每 refresh_rate 秒或手动触发进入 running。
 * 每次运行前重新读取配置；各 plugin 互不影响，失败留到下一轮重试。
 */

import { create } from "zustand";
import { ConfigError, NetworkError } from "@/lib/errors";
import { reportOperationError } from "@/lib/reportError";
import { loadConfig, refreshIntervalMs } from "@/services/config/loader";
import { DEFAULT_REFRESH_RATE_SECS } from "@/services/config/schema";
import { createNoteStore, type NoteStore, type RandomSource } from "@/services/notes";
import { runPlugin } from "@/services/pipeline/runPlugin";
import type {
  GlobalConfig,
  PluginConfig,
  PluginRunResult,
  RunSummary,
  RunTrigger,
  SchedulerStatus,
} from "@/types/notecast";

const DEFAULT_INTERVAL_MS = DEFAULT_REFRESH_RATE_SECS * 1000;
/** setTimeout 的上限（32 位有符号整数），超出会被当成 1ms */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

interface SchedulerStoreState {
  status: SchedulerStatus;
  configPath: string | null;
  /** 定时循环是否开启 */
  active: boolean;
  intervalMs: number;
  nextRunAt: number | null;
  lastRun: RunSummary | null;
  /** webhook -> 限流解除时间 */
  throttledUntil: Record<string, number>;
  /** 选笔记用的随机源，测试可替换 */
  random: RandomSource;
  start: (configPath: string) => Promise<void>;
  stop: () => void;
  runNow: (trigger?: RunTrigger) => Promise<RunSummary | null>;
}

let tickTimer: ReturnType<typeof setTimeout> | null = null;

const clearTick = () => {
  if (tickTimer) {
    clearTimeout(tickTimer);
    tickTimer = null;
  }
};

const pruneThrottles = (throttledUntil: Record<string, number>, now: number) =>
  Object.fromEntries(Object.entries(throttledUntil).filter(([, until]) => until > now));

export const useSchedulerStore = create<SchedulerStoreState>()((set, get) => {
  // 超长间隔分段等待，直到 runAt 才真正触发
  const armTimer = (runAt: number) => {
    const wait = Math.min(Math.max(runAt - Date.now(), 0), MAX_TIMER_DELAY_MS);
    tickTimer = setTimeout(() => {
      if (Date.now() < runAt) {
        armTimer(runAt);
        return;
      }
      void tick();
    }, wait);
  };

  const scheduleNext = () => {
    clearTick();
    if (!get().active) return;

    const runAt = Date.now() + get().intervalMs;
    set({ nextRunAt: runAt });
    armTimer(runAt);
  };

  const tick = async () => {
    tickTimer = null;
    try {
      await get().runNow("timer");
    } catch (error) {
      // runNow 自身不应抛错；兜底保证定时循环不中断
      reportOperationError({ source: "Scheduler.tick", action: "Scheduled refresh", error });
    } finally {
      scheduleNext();
    }
  };

  const runOne = async (
    plugin: PluginConfig,
    index: number,
    store: NoteStore,
    intervalMs: number,
  ): Promise<PluginRunResult> => {
    const base = { index, webhook: plugin.webhook };

    const until = get().throttledUntil[plugin.webhook];
    if (until !== undefined && until > Date.now()) {
      console.log(
        `[Scheduler] plugin #${index} throttled until ${new Date(until).toISOString()}, skipping`,
      );
      return { ...base, outcome: "throttled" };
    }

    try {
      const result = await runPlugin(plugin, { store, random: get().random });
      if (result.outcome === "no-match") {
        console.log(`[Scheduler] plugin #${index}: no notes match "${plugin.search_query}"`);
        return { ...base, outcome: "no-match" };
      }
      console.log(
        `[Scheduler] plugin #${index}: pushed note ${result.noteId} (${result.fieldCount} fields), ${result.status}`,
      );
      return { ...base, outcome: "pushed", noteId: result.noteId, fieldCount: result.fieldCount };
    } catch (error) {
      if (error instanceof NetworkError && error.throttled) {
        const resumeAt = Date.now() + (error.retryAfterMs ?? intervalMs);
        set((state) => ({ throttledUntil: { ...state.throttledUntil, [plugin.webhook]: resumeAt } }));
      }
      const message = reportOperationError({
        source: `Scheduler.plugin[${index}]`,
        action: "Push notes",
        error,
        level: "warning",
      });
      return { ...base, outcome: "failed", error: message };
    }
  };

  return {
    status: "idle",
    configPath: null,
    active: false,
    intervalMs: DEFAULT_INTERVAL_MS,
    nextRunAt: null,
    lastRun: null,
    throttledUntil: {},
    random: Math.random,

    start: async (configPath) => {
      clearTick();
      set({ configPath, active: true });
      console.log(`[Scheduler] Starting with config ${configPath}`);

      try {
        const config = await loadConfig(configPath);
        set({ intervalMs: refreshIntervalMs(config) });
      } catch (error) {
        reportOperationError({ source: "Scheduler.start", action: "Load config", error });
      }
      scheduleNext();
    },

    stop: () => {
      clearTick();
      set({ active: false, nextRunAt: null });
      console.log("[Scheduler] Stopped");
    },

    runNow: async (trigger = "manual") => {
      if (get().status === "running") {
        console.log(`[Scheduler] Refresh already in progress, ignoring ${trigger} trigger`);
        return null;
      }
      set({ status: "running" });

      const startedAt = Date.now();
      const finish = (summary: Omit<RunSummary, "trigger" | "startedAt" | "finishedAt">) => {
        const lastRun: RunSummary = { trigger, startedAt, finishedAt: Date.now(), ...summary };
        set({ lastRun });
        return lastRun;
      };

      try {
        const configPath = get().configPath;
        let config: GlobalConfig;
        try {
          if (!configPath) {
            throw new ConfigError("No config file set", "configPath", configPath);
          }
          config = await loadConfig(configPath);
        } catch (error) {
          const message = reportOperationError({
            source: "Scheduler.runNow",
            action: "Load config",
            error,
          });
          return finish({ intervalMs: get().intervalMs, results: [], configError: message });
        }

        const intervalMs = refreshIntervalMs(config);
        set((state) => ({ intervalMs, throttledUntil: pruneThrottles(state.throttledUntil, startedAt) }));
        console.log(`[Scheduler] Refreshing (${trigger}), ${config.plugins.length} plugin(s)`);

        const store = createNoteStore(config);
        const runs = config.plugins.map((plugin, index) =>
          plugin.enabled ? runOne(plugin, index, store, intervalMs) : null,
        );
        const results = (await Promise.all(runs)).filter(
          (result): result is PluginRunResult => result !== null,
        );

        return finish({ intervalMs, results, configError: null });
      } finally {
        set({ status: "idle" });
      }
    },
  };
});
