import type { Note } from "@/types/notecast";
import type { NoteStore } from "./types";
import { hasFieldContent } from "./payload";

export type RandomSource = () => number;

/**
 * 按搜索条件选出一条笔记
 *
 * 只保留至少有一个 visible field 非空的笔记，再从中均匀随机取一条。
 * 没有匹配时返回 null（本轮跳过推送，不算错误）。查询错误以 QueryError 抛出。
 */
export async function selectNote(
  store: NoteStore,
  searchQuery: string,
  visibleFields: readonly string[],
  random: RandomSource = Math.random,
): Promise<Note | null> {
  const noteIds = await store.findNotes(searchQuery);
  if (noteIds.length === 0) return null;

  const notes = await store.notesInfo(noteIds);
  const candidates = notes.filter((note) =>
    visibleFields.some((field) => hasFieldContent(note.fields[field])),
  );
  if (candidates.length === 0) return null;

  const index = Math.min(Math.floor(random() * candidates.length), candidates.length - 1);
  return candidates[index];
}
