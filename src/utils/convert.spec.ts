import { convertSqliteTimestamp, truncateText } from "./convert";

describe("convertSqliteTimestamp", () => {
  it("reads SQLite timestamps as UTC", () => {
    expect(convertSqliteTimestamp("2026-01-02 03:04:05")).toBe("2026-01-02T03:04:05.000Z");
  });

  it("returns other values unchanged", () => {
    expect(convertSqliteTimestamp("yesterday")).toBe("yesterday");
  });
});

describe("truncateText", () => {
  it("keeps short text", () => {
    expect(truncateText("Go run", 50)).toBe("Go run");
  });

  it("cuts long text and marks it", () => {
    expect(truncateText("abcdefghij", 4)).toBe("abcd...");
  });

  it("keeps an emoji whole at the cut", () => {
    const text = `${"a".repeat(49)}💪 keep going`;

    expect(truncateText(text, 50)).toBe(`${"a".repeat(49)}💪...`);
  });

  it("counts an emoji as one character", () => {
    expect(truncateText("run 💪", 5)).toBe("run 💪");
  });
});
