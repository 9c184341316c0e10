/**
 * Webhook 客户端
 *
 * 推送：POST { merge_variables: { fields: <blob> } }
 * 显示端：GET 同一地址，取回最近一次推送的 merge_variables
 */

import { z } from "zod";
import { CorruptPayloadError, NetworkError } from "@/lib/errors";
import type { CompressedBlob } from "@/types/notecast";

export const MERGE_VARIABLE = "fields";
const REQUEST_TIMEOUT_MS = 15_000;

export interface WebhookEnvelope {
  merge_variables: Record<typeof MERGE_VARIABLE, CompressedBlob>;
}

export interface PushResult {
  status: number;
  body: string;
}

const envelopeSchema = z.object({
  merge_variables: z.object({ [MERGE_VARIABLE]: z.string() }),
});

export function buildEnvelope(blob: CompressedBlob): WebhookEnvelope {
  return { merge_variables: { [MERGE_VARIABLE]: blob } };
}

/** Retry-After 只支持秒数形式 */
export function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const secs = Number(header.trim());
  return Number.isFinite(secs) && secs >= 0 ? secs * 1000 : undefined;
}

async function send(url: string, init: RequestInit): Promise<Response> {
  try {
    return await fetch(url, { ...init, signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) });
  } catch (error) {
    throw new NetworkError(`Request to webhook failed: ${String(error)}`, undefined, undefined, {
      cause: error,
    });
  }
}

async function failOnStatus(response: Response): Promise<void> {
  if (response.ok) return;
  const text = await response.text().catch(() => "");
  throw new NetworkError(
    `Webhook answered ${response.status} ${response.statusText}${text ? `: ${text}` : ""}`,
    response.status,
    response.status === 429 ? parseRetryAfter(response.headers.get("Retry-After")) : undefined,
  );
}

export async function pushBlob(url: string, blob: CompressedBlob): Promise<PushResult> {
  const response = await send(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(buildEnvelope(blob)),
  });
  await failOnStatus(response);
  return { status: response.status, body: await response.text() };
}

export async function fetchLatestBlob(url: string): Promise<CompressedBlob> {
  const response = await send(url, {
    method: "GET",
    headers: { Accept: "application/json" },
  });
  await failOnStatus(response);

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new CorruptPayloadError("Webhook did not return JSON", { cause: error });
  }

  const envelope = envelopeSchema.safeParse(body);
  if (!envelope.success) {
    throw new CorruptPayloadError(`Webhook response has no "${MERGE_VARIABLE}" merge variable`);
  }
  return envelope.data.merge_variables[MERGE_VARIABLE];
}
