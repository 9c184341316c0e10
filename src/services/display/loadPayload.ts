import { decompressPayload } from "@/services/codec/payloadCodec";
import { fetchLatestBlob } from "@/services/webhook/client";
import type { Payload } from "@/types/notecast";

/**
 * 取回最近一次推送并解压
 *
 * 网络错误抛 NetworkError，数据损坏抛 CorruptPayloadError
 */
export async function loadLatestPayload(source: string): Promise<Payload> {
  const blob = await fetchLatestBlob(source);
  return decompressPayload(blob);
}
