export type NotecastErrorKind = "config" | "query" | "corrupt-payload" | "network";

export abstract class NotecastError extends Error {
  abstract readonly kind: NotecastErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** 配置缺失或格式错误；只中止本次运行或出错的 plugin */
export class ConfigError extends NotecastError {
  readonly kind = "config";

  constructor(
    message: string,
    readonly field?: string,
    readonly value?: unknown,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }

  override toString(): string {
    if (!this.field) return `${this.name}: ${this.message}`;
    if (this.value === undefined) return `${this.name}: ${this.message} (${this.field})`;
    return `${this.name}: ${this.message} (${this.field}: ${String(this.value)})`;
  }
}

/** 搜索语法错误，或笔记库连不上 */
export class QueryError extends NotecastError {
  readonly kind = "query";

  constructor(message: string, readonly action?: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class CorruptPayloadError extends NotecastError {
  readonly kind = "corrupt-payload";
}

export class NetworkError extends NotecastError {
  readonly kind = "network";

  constructor(
    message: string,
    readonly status?: number,
    readonly retryAfterMs?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }

  get throttled(): boolean {
    return this.status === 429;
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof ConfigError) return error.toString();
  return error instanceof Error ? error.message : String(error);
}
