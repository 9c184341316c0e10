/**
 * 负载编解码
 *
 * 字段值列表 -> JSON -> zlib(level 9) -> base64
 * 与显示端模板使用的标准 zlib inflate 兼容
 */

import { strFromU8, strToU8, unzlibSync, zlibSync } from "fflate";
import { z } from "zod";
import { decodeBase64Strict, encodeBase64 } from "@/lib/base64";
import { CorruptPayloadError } from "@/lib/errors";
import type { CompressedBlob, Payload } from "@/types/notecast";

const payloadSchema = z.array(z.string());

/** 2 字节头 + 4 字节 Adler-32 尾 */
const ZLIB_FRAME_BYTES = 6;
const ADLER_MOD = 65521;

export function adler32(bytes: Uint8Array): number {
  let a = 1;
  let b = 0;
  for (const byte of bytes) {
    a = (a + byte) % ADLER_MOD;
    b = (b + a) % ADLER_MOD;
  }
  return ((b << 16) | a) >>> 0;
}

// fflate 的 unzlibSync 不校验尾部 Adler-32，这里自己核对
const storedChecksum = (frame: Uint8Array) => {
  const tail = frame.length - 4;
  return ((frame[tail] << 24) | (frame[tail + 1] << 16) | (frame[tail + 2] << 8) | frame[tail + 3]) >>> 0;
};

export function compressPayload(payload: Payload): CompressedBlob {
  const bytes = strToU8(JSON.stringify(payload));
  return encodeBase64(zlibSync(bytes, { level: 9 }));
}

export function decompressPayload(blob: CompressedBlob): Payload {
  const frame = decodeBase64Strict(blob);
  if (!frame) {
    throw new CorruptPayloadError("Payload is not valid base64");
  }
  if (frame.length < ZLIB_FRAME_BYTES) {
    throw new CorruptPayloadError("Payload is too short to be a zlib stream");
  }

  let inflated: Uint8Array;
  try {
    inflated = unzlibSync(frame);
  } catch (error) {
    throw new CorruptPayloadError("Payload could not be inflated", { cause: error });
  }
  if (adler32(inflated) !== storedChecksum(frame)) {
    throw new CorruptPayloadError("Payload checksum does not match");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(strFromU8(inflated));
  } catch (error) {
    throw new CorruptPayloadError("Inflated payload is not JSON", { cause: error });
  }

  const result = payloadSchema.safeParse(parsed);
  if (!result.success) {
    throw new CorruptPayloadError("Inflated payload is not a list of field values");
  }
  return result.data;
}
