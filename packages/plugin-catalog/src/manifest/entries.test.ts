import { describe, it, expect } from "vitest";
import { entryStem, extractElementNames, toElementEntry, toManifestEntry } from "./entries.js";

describe("toElementEntry", () => {
  it("tags strings as paths and objects as named entries", () => {
    expect(toElementEntry("./agents/a.md")).toEqual({ kind: "path", path: "./agents/a.md" });
    expect(toElementEntry({ name: "inline", model: "opus" })).toEqual({
      kind: "named",
      name: "inline",
      fields: { name: "inline", model: "opus" },
    });
  });

  it("ignores non-string names on objects", () => {
    expect(toElementEntry({ name: 7 })).toEqual({ kind: "named", name: undefined, fields: { name: 7 } });
  });

  it("returns null for other values", () => {
    expect(toElementEntry(3)).toBeNull();
    expect(toElementEntry(null)).toBeNull();
    expect(toElementEntry(["./a.md"])).toBeNull();
  });
});

describe("toManifestEntry", () => {
  it("writes entries back in manifest form", () => {
    expect(toManifestEntry({ kind: "path", path: "./SKILL.md" })).toBe("./SKILL.md");
    expect(toManifestEntry({ kind: "named", name: "x", fields: { name: "x" } })).toEqual({ name: "x" });
  });
});

describe("entryStem", () => {
  it("drops directories and the last extension", () => {
    expect(entryStem("./SKILL.md")).toBe("SKILL");
    expect(entryStem("skills/pdf/")).toBe("pdf");
    expect(entryStem("a/b.c.md")).toBe("b.c");
  });
});

describe("extractElementNames", () => {
  it("skips named entries without a name", () => {
    expect(
      extractElementNames([
        { kind: "path", path: "./commands/deploy.md" },
        { kind: "named", fields: {} },
        { kind: "named", name: "rollback", fields: { name: "rollback" } },
      ])
    ).toEqual(["deploy", "rollback"]);
  });
});
