// @vitest-environment node
import { describe, expect, it } from "vitest";
import type { Note } from "@/types/notecast";
import { buildPayload, hasFieldContent } from "./payload";

const vocab: Note = {
  id: 1,
  modelName: "Vocab",
  tags: [],
  fields: { Meaning: "m", Word: "w", Sentence: "s" },
};

describe("buildPayload", () => {
  it("follows the visible field order, not the note's", () => {
    expect(buildPayload(vocab, ["Word", "Meaning", "Sentence"])).toEqual(["w", "m", "s"]);
  });

  it("skips fields the note lacks", () => {
    expect(buildPayload(vocab, ["Word", "Extra"])).toEqual(["w"]);
  });

  it("skips empty fields", () => {
    const note: Note = { ...vocab, fields: { Word: "w", Meaning: "", Sentence: "  " } };
    expect(buildPayload(note, ["Word", "Meaning", "Sentence"])).toEqual(["w"]);
  });

  it("passes markup through unchanged", () => {
    const note: Note = { ...vocab, fields: { Word: '<ruby>食<rt>た</rt></ruby>べる &amp; <b>x</b>' } };
    expect(buildPayload(note, ["Word"])).toEqual(['<ruby>食<rt>た</rt></ruby>べる &amp; <b>x</b>']);
  });

  it("drops media-only fields but keeps text next to media", () => {
    const note: Note = {
      ...vocab,
      fields: {
        Audio: "[sound:taberu.mp3]",
        Picture: '<img src="taberu.jpg"> ',
        Word: 'w <img src="w.png">',
      },
    };
    expect(buildPayload(note, ["Audio", "Picture", "Word"])).toEqual(['w <img src="w.png">']);
  });

  it("returns an empty payload when nothing is visible", () => {
    expect(buildPayload(vocab, [])).toEqual([]);
  });
});

describe("hasFieldContent", () => {
  it("treats missing, blank and media-only values as empty", () => {
    expect(hasFieldContent(undefined)).toBe(false);
    expect(hasFieldContent("")).toBe(false);
    expect(hasFieldContent(" \n")).toBe(false);
    expect(hasFieldContent("[sound:a.mp3][sound:b.mp3]")).toBe(false);
    expect(hasFieldContent("<IMG SRC='a.png'>")).toBe(false);
    expect(hasFieldContent("text")).toBe(true);
  });
});
