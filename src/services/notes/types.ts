import type { Note } from "@/types/notecast";

/**
 * 外部笔记库查询接口
 *
 * 查询语法由笔记库自身解释，本项目不做解析
 */
export interface NoteStore {
  findNotes(query: string): Promise<number[]>;
  notesInfo(noteIds: number[]): Promise<Note[]>;
}
