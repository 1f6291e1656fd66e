import { describe, it, expect } from "vitest";
import { parseFrontmatter } from "./frontmatter.js";

describe("parseFrontmatter", () => {
  it("splits YAML frontmatter from the body", () => {
    const parsed = parseFrontmatter("---\nname: reviewer\nmodel: sonnet\n---\n\n# Reviewer\n");

    expect(parsed).toEqual({
      data: { name: "reviewer", model: "sonnet" },
      content: "# Reviewer",
    });
  });

  it("returns empty data when there is no frontmatter", () => {
    expect(parseFrontmatter("# Demo")).toEqual({ data: {}, content: "# Demo" });
  });

  it("falls back to single-line fields when the YAML is malformed", () => {
    const parsed = parseFrontmatter("---\nname: broken\ndescription: [unclosed\n---\nBody");

    expect(parsed).toEqual({
      data: { name: "broken", description: "[unclosed" },
      content: "Body",
    });
  });

  it("does not share data objects between identical inputs", () => {
    const first = parseFrontmatter("---\nname: same\n---\nBody");
    first.data.name = "changed";

    expect(parseFrontmatter("---\nname: same\n---\nBody").data).toEqual({ name: "same" });
  });
});
