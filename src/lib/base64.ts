/** 标准字母表、带填充；不接受 URL-safe 字符和空白 */
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64");
}

/**
 * 严格解码：空串或非规范 base64 返回 null。
 * Buffer.from 会静默丢弃非法字符，所以先整体校验。
 */
export function decodeBase64Strict(text: string): Uint8Array | null {
  if (text.length === 0 || !BASE64_PATTERN.test(text)) return null;
  return Buffer.from(text, "base64");
}
