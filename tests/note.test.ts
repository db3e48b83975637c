import { describe, it, expect } from "vitest";
import { buildNote, formatContent, normalizeTags } from "../src/notes/note.js";
import type { Note } from "../src/notes/types.js";
import { EmptyContentError, InvalidFormatError } from "../src/utils/errors.js";

const at = new Date(2026, 9, 19, 14, 30);

function note(overrides: Partial<Note>): Note {
  return { content: "hello", format: "plain", tags: [], timestamp: at, ...overrides };
}

describe("formatContent", () => {
  it("plain joins time, content and tags with spaces", () => {
    expect(formatContent(note({ tags: ["work", "idea"] }))).toBe("14:30 hello #work #idea");
    expect(formatContent(note({}))).toBe("14:30 hello");
    expect(formatContent(note({ timestamp: null, tags: ["work"] }))).toBe("hello #work");
    expect(formatContent(note({ timestamp: null }))).toBe("hello");
  });

  it("timestamp bolds the time", () => {
    expect(formatContent(note({ format: "timestamp" }))).toBe("**14:30** - hello");
    expect(formatContent(note({ format: "timestamp", tags: ["work"] }))).toBe("**14:30** - hello #work");
    expect(formatContent(note({ format: "timestamp", timestamp: null, tags: ["work"] }))).toBe(
      "hello #work"
    );
    expect(formatContent(note({ format: "timestamp", timestamp: null }))).toBe("hello");
  });

  it("bullet renders a list item", () => {
    expect(formatContent(note({ format: "bullet" }))).toBe("- 14:30 - hello");
    expect(formatContent(note({ format: "bullet", tags: ["a", "b"] }))).toBe("- 14:30 - hello #a #b");
    expect(formatContent(note({ format: "bullet", timestamp: null }))).toBe("- hello");
  });

  it("task renders an unchecked checkbox", () => {
    expect(formatContent(note({ format: "task", content: "task x", tags: ["work"] }))).toBe(
      "- [ ] 14:30 - task x #work"
    );
    expect(formatContent(note({ format: "task", timestamp: null }))).toBe("- [ ] hello");
  });

  it("uses the given timestamp format", () => {
    expect(formatContent(note({ format: "timestamp" }), "%H:%M:%S")).toBe("**14:30:00** - hello");
  });

  it("inserts content verbatim", () => {
    const raw = "  <b>*not* escaped</b> [[link]] ";
    expect(formatContent(note({ content: raw, timestamp: null }))).toBe(raw);
  });
});

describe("buildNote", () => {
  it("rejects blank content", () => {
    expect(() => buildNote({ content: "   \n", format: "plain", includeTimestamp: true })).toThrow(
      EmptyContentError
    );
  });

  it("rejects unknown formats", () => {
    expect(() => buildNote({ content: "x", format: "fancy", includeTimestamp: true })).toThrow(
      InvalidFormatError
    );
  });

  it("drops the timestamp when disabled", () => {
    const built = buildNote({ content: "x", format: "task", includeTimestamp: false, timestamp: at });
    expect(built.timestamp).toBeNull();
    expect(formatContent(built)).toBe("- [ ] x");
  });

  it("keeps the given timestamp when enabled", () => {
    const built = buildNote({ content: "x", format: "bullet", includeTimestamp: true, timestamp: at });
    expect(built.timestamp).toBe(at);
  });

  it("normalizes tags into an ordered set", () => {
    expect(normalizeTags(["#work", "work", "", " idea ", "##x"])).toEqual(["work", "idea", "x"]);
  });
});
