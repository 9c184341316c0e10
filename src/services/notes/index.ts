import type { GlobalConfig } from "@/types/notecast";
import { AnkiConnectStore } from "./ankiConnect";
import type { NoteStore } from "./types";

export type { NoteStore } from "./types";
export { AnkiConnectStore } from "./ankiConnect";
export { selectNote, type RandomSource } from "./selector";
export { buildPayload, hasFieldContent } from "./payload";

export function createNoteStore(config: GlobalConfig): NoteStore {
  return new AnkiConnectStore({
    url: config.anki_connect_url,
    key: config.anki_connect_key,
  });
}
