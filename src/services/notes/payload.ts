import type { Note, Payload } from "@/types/notecast";

const IMG_TAG = /<img\b[^>]*>/gi;
const SOUND_TAG = /\[sound:[^\]]*\]/gi;

/**
 * 字段是否有可显示的文本
 *
 * 只有图片/音频引用的字段视为空（显示端只支持文本）
 */
export function hasFieldContent(value: string | undefined): value is string {
  if (!value) return false;
  return value.replace(IMG_TAG, "").replace(SOUND_TAG, "").trim().length > 0;
}

/**
 * 按 visibleFields 顺序取出字段值；缺失或为空的字段跳过，不补位。
 * 字段内容原样保留，不做转义。
 */
export function buildPayload(note: Note, visibleFields: readonly string[]): Payload {
  const payload: Payload = [];
  for (const field of visibleFields) {
    const value = note.fields[field];
    if (hasFieldContent(value)) {
      payload.push(value);
    }
  }
  return payload;
}
