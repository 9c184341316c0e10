import { getErrorMessage } from "./errors";
import { useErrorStore, type ErrorLevel } from "@/stores/useErrorStore";

export interface ReportOperationErrorInput {
  /** 出错位置，如 `Scheduler.runNow` */
  source: string;
  /** 用户可读的操作名 */
  action: string;
  error: unknown;
  userMessage?: string;
  level?: ErrorLevel;
}

/**
 * 统一错误上报：打日志 + 写入错误通知
 *
 * @returns 展示给用户的消息
 */
export function reportOperationError({
  source,
  action,
  error,
  userMessage,
  level = "error",
}: ReportOperationErrorInput): string {
  const message = userMessage ?? getErrorMessage(error);
  const log = level === "warning" ? console.warn : console.error;
  log(`[${source}] ${action} failed:`, message);

  useErrorStore.getState().pushNotice({
    title: `${action} failed`,
    message,
    level,
    source,
    action,
    detail: error instanceof Error && error.stack ? error.stack : undefined,
  });

  return message;
}
