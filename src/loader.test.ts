import path from "node:path";
import { describe, expect, it } from "vitest";
import { Chunker } from "./chunker";
import { CorpusReadError } from "./errors";
import { discoverMarkdownFiles, loadDocuments } from "./loader";
import { makeCorpus, words } from "./test/fakes";
import type { Chunk } from "./types";

describe("loadDocuments", () => {
  it("walks the tree recursively, skipping excluded folders and non-markdown files", async () => {
    const root = await makeCorpus({
      "intro.md": "# Welcome\n\nHello.\n",
      "guide/setup.md": "---\ntitle: Setup Guide\n---\n# Setup\n\nSteps.\n",
      "guide/deep/notes.markdown": "Plain notes.\n",
      "node_modules/pkg/readme.md": "# Vendored\n",
      "notes.txt": "not markdown",
    });

    const docs = await loadDocuments(root, { excludedFolders: ["node_modules"] });

    expect(docs.map((d) => d.path)).toEqual(["guide/deep/notes.markdown", "guide/setup.md", "intro.md"]);
    const setup = docs.find((d) => d.path === "guide/setup.md");
    expect(setup?.title).toBe("Setup Guide");
    expect(setup?.text.trim()).toBe("# Setup\n\nSteps.");
    expect(setup?.absolutePath).toBe(path.join(root, "guide", "setup.md"));
    expect(docs.find((d) => d.path === "intro.md")?.title).toBe("Welcome");
    expect(docs.find((d) => d.path === "guide/deep/notes.markdown")?.title).toBeUndefined();
  });

  it("fails with CorpusReadError when the root is missing", async () => {
    const root = path.join(await makeCorpus({}), "does-not-exist");
    await expect(loadDocuments(root)).rejects.toBeInstanceOf(CorpusReadError);
  });

  it("fails with CorpusReadError when the root is a file", async () => {
    const root = await makeCorpus({ "file.md": "# x\n" });
    await expect(discoverMarkdownFiles(path.join(root, "file.md"))).rejects.toBeInstanceOf(CorpusReadError);
  });

  it("returns an empty list for a directory without markdown", async () => {
    const root = await makeCorpus({ "readme.txt": "nothing" });
    expect(await loadDocuments(root)).toEqual([]);
  });
});

describe("load + chunk", () => {
  it("turns intro.md with headers A and B into two chunks when each section is under the 1000-character budget", async () => {
    const root = await makeCorpus({
      "intro.md": `# A\n\n${words("abc", 200)}\n\n# B\n\n${words("abc", 50)}\n`,
    });
    const docs = await loadDocuments(root);
    const chunker = new Chunker({ chunkSize: 1000, chunkOverlap: 100 });

    const chunks: Chunk[] = [];
    for await (const c of chunker.chunkAll(docs)) chunks.push(c);

    expect(chunks).toHaveLength(2);
    expect(chunks.map((c) => c.source)).toEqual(["intro.md", "intro.md"]);
    expect(chunks.map((c) => c.heading)).toEqual(["A", "B"]);
  });
});
