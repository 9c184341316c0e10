/**
 * AnkiConnect 客户端
 *
 * 通过 AnkiConnect 插件的 HTTP 接口查询 Anki 笔记
 * https://foosoft.net/projects/anki-connect/
 */

import { z } from "zod";
import { QueryError } from "@/lib/errors";
import type { Note } from "@/types/notecast";
import type { NoteStore } from "./types";

const ANKI_CONNECT_VERSION = 6;
const REQUEST_TIMEOUT_MS = 15_000;

const envelopeSchema = z.object({
  result: z.unknown(),
  error: z.string().nullable(),
});

const noteIdsSchema = z.array(z.number().int());

const noteInfoSchema = z.object({
  noteId: z.number().int(),
  modelName: z.string(),
  tags: z.array(z.string()),
  fields: z.record(z.object({ value: z.string(), order: z.number() })),
});

// notesInfo 对已删除的笔记返回空对象
const notesInfoSchema = z.array(
  z.union([noteInfoSchema, z.object({}).strict().transform(() => null)]),
);

export interface AnkiConnectOptions {
  url: string;
  key?: string;
  timeoutMs?: number;
}

export class AnkiConnectStore implements NoteStore {
  private readonly url: string;
  private readonly key?: string;
  private readonly timeoutMs: number;

  constructor(options: AnkiConnectOptions) {
    this.url = options.url;
    this.key = options.key;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
  }

  async findNotes(query: string): Promise<number[]> {
    const result = await this.invoke("findNotes", { query });
    return this.parseResult("findNotes", noteIdsSchema, result);
  }

  async notesInfo(noteIds: number[]): Promise<Note[]> {
    if (noteIds.length === 0) return [];
    const result = await this.invoke("notesInfo", { notes: noteIds });
    const infos = this.parseResult("notesInfo", notesInfoSchema, result);

    const notes: Note[] = [];
    for (const info of infos) {
      if (!info) continue;
      const ordered = Object.entries(info.fields).sort(([, a], [, b]) => a.order - b.order);
      notes.push({
        id: info.noteId,
        modelName: info.modelName,
        tags: info.tags,
        fields: Object.fromEntries(ordered.map(([name, field]) => [name, field.value])),
      });
    }
    return notes;
  }

  /**
   * 发送一次 AnkiConnect action，返回 result 字段
   */
  private async invoke(action: string, params: Record<string, unknown>): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(this.url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          action,
          version: ANKI_CONNECT_VERSION,
          params,
          ...(this.key ? { key: this.key } : {}),
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new QueryError(`Note store is unreachable at ${this.url}`, action, { cause: error });
    }

    if (!response.ok) {
      throw new QueryError(`Note store answered ${response.status} ${response.statusText}`, action);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new QueryError("Note store returned invalid JSON", action, { cause: error });
    }

    const envelope = envelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new QueryError("Note store returned an unexpected response", action);
    }
    if (envelope.data.error !== null) {
      throw new QueryError(envelope.data.error, action);
    }
    return envelope.data.result;
  }

  private parseResult<T>(action: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, result: unknown): T {
    const parsed = schema.safeParse(result);
    if (!parsed.success) {
      throw new QueryError(`Note store returned a malformed ${action} result`, action);
    }
    return parsed.data;
  }
}
