import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest";
import { realpath } from "node:fs/promises";
import { join } from "node:path";
import { PluginNotFoundError } from "@plugin-catalog/core";
import {
  createTempDir,
  removeDir,
  writeFileAt,
  writeMarketplace,
} from "@plugin-catalog/core/testing";
import { parseElementReference } from "./commands/load.js";
import { createProgram } from "./program.js";

describe("parseElementReference", () => {
  it("splits on the first colon", () => {
    expect(parseElementReference("skills:pdf")).toEqual({ category: "skills", name: "pdf" });
    expect(parseElementReference("commands:ns:deploy")).toEqual({
      category: "commands",
      name: "ns:deploy",
    });
  });

  it("rejects references without both parts", () => {
    expect(() => parseElementReference("pdf")).toThrow("Expected <category>:<name>");
    expect(() => parseElementReference(":pdf")).toThrow("Expected <category>:<name>");
    expect(() => parseElementReference("skills:")).toThrow("Expected <category>:<name>");
  });
});

describe("plugin-catalog CLI", () => {
  let root: string;
  let marketplaceDir: string;
  let log: MockInstance<typeof console.log>;

  beforeEach(async () => {
    root = await realpath(await createTempDir());
    marketplaceDir = await writeMarketplace(root, "acme", {
      plugins: [{ name: "demo", source: "./", skills: ["./skills/pdf"] }],
    });
    await writeFileAt(join(marketplaceDir, "skills", "pdf", "SKILL.md"), "# PDF");
    log = vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    log.mockRestore();
    await removeDir(root);
  });

  const run = (...args: string[]) =>
    createProgram().parseAsync(["--marketplaces-dir", root, ...args], { from: "user" });

  function printed(): unknown {
    const [call] = log.mock.calls;
    return JSON.parse(String(call?.[0]));
  }

  it("lists plugins as JSON", async () => {
    await run("list");

    expect(printed()).toEqual([
      { name: "demo", description: "", agents: [], commands: [], skills: ["pdf"] },
    ]);
  });

  it("describes a plugin", async () => {
    await run("describe", "demo");

    expect(printed()).toMatchObject({ name: "demo", skills: ["./skills/pdf"], marketplace: "acme" });
  });

  it("loads elements given as category:name", async () => {
    await run("load", "demo", "skills:pdf", "skills:missing");

    expect(printed()).toEqual({
      pluginName: "demo",
      elements: [
        {
          category: "skills",
          name: "pdf",
          path: join(marketplaceDir, "skills", "pdf", "SKILL.md"),
          content: "# PDF",
          frontmatter: {},
        },
      ],
    });
  });

  it("propagates catalog errors", async () => {
    await expect(run("describe", "ghost")).rejects.toBeInstanceOf(PluginNotFoundError);
  });
});
