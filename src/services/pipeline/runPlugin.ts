/**
 * 单个 plugin 的一次推送：选笔记 -> 组装负载 -> 压缩 -> 推送
 */

import { ConfigError } from "@/lib/errors";
import { compressPayload } from "@/services/codec/payloadCodec";
import { buildPayload, selectNote, type NoteStore, type RandomSource } from "@/services/notes";
import { pushBlob } from "@/services/webhook/client";
import type { PluginConfig } from "@/types/notecast";

export interface PipelineContext {
  store: NoteStore;
  random?: RandomSource;
}

export type PipelineOutcome =
  | { outcome: "pushed"; noteId: number; fieldCount: number; status: number }
  | { outcome: "no-match" };

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}

export function assertRunnable(plugin: PluginConfig): void {
  if (!plugin.webhook) {
    throw new ConfigError("No webhook URL given", "webhook", plugin.webhook);
  }
  if (!isHttpUrl(plugin.webhook)) {
    throw new ConfigError("Webhook is not an http(s) URL", "webhook", plugin.webhook);
  }
  if (plugin.visible_fields.length === 0) {
    throw new ConfigError("No visible fields given", "visible_fields", "[]");
  }
}

export async function runPlugin(plugin: PluginConfig, context: PipelineContext): Promise<PipelineOutcome> {
  assertRunnable(plugin);

  const note = await selectNote(context.store, plugin.search_query, plugin.visible_fields, context.random);
  if (!note) {
    return { outcome: "no-match" };
  }

  const payload = buildPayload(note, plugin.visible_fields);
  const response = await pushBlob(plugin.webhook, compressPayload(payload));
  return { outcome: "pushed", noteId: note.id, fieldCount: payload.length, status: response.status };
}
