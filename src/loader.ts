import fs from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import { CorpusReadError, errorMessage } from "./errors";
import { parseMarkdown, stripFrontMatter } from "./markdown";
import type { Document } from "./types";

export interface LoadOptions {
  /** Folder names (not globs) skipped anywhere in the tree. */
  excludedFolders?: string[];
  /** File extensions without the leading dot. */
  extensions?: string[];
  verbose?: boolean;
}

const DEFAULT_EXTENSIONS = ["md", "markdown"];

/** Path relative to the root with forward slashes, whatever the platform. */
function toSourcePath(root: string, abs: string): string {
  return path.relative(root, abs).split(path.sep).join("/");
}

function firstHeading(text: string): string | undefined {
  for (const span of parseMarkdown(text)) {
    if (span.kind === "heading" && span.title) return span.title;
  }
  return undefined;
}

/**
 * List markdown files under `root`, sorted by relative path.
 *
 * @throws {CorpusReadError} If `root` does not exist or is not a directory.
 */
export async function discoverMarkdownFiles(root: string, opts: LoadOptions = {}): Promise<string[]> {
  const st = await fs.stat(root).catch((e: unknown) => {
    throw new CorpusReadError(`Documentation root not found: ${root}`, { cause: e });
  });
  if (!st.isDirectory()) throw new CorpusReadError(`Documentation root is not a directory: ${root}`);

  const extensions = opts.extensions?.length ? opts.extensions : DEFAULT_EXTENSIONS;
  const patterns = extensions.map((ext) => `**/*.${ext.replace(/^\./, "")}`);
  const ignore = (opts.excludedFolders ?? []).map((name) => `**/${name}/**`);
  const files = await fg(patterns, { cwd: root, absolute: true, dot: false, onlyFiles: true, ignore });
  return files.sort((a, b) => toSourcePath(root, a).localeCompare(toSourcePath(root, b)));
}

/**
 * Read one markdown file into a {@link Document}.
 *
 * @throws {CorpusReadError} If the file cannot be read.
 */
export async function loadDocument(root: string, abs: string): Promise<Document> {
  let raw: string;
  let size: number;
  try {
    raw = await fs.readFile(abs, "utf8");
    size = Buffer.byteLength(raw, "utf8");
  } catch (e) {
    throw new CorpusReadError(`Cannot read ${abs}: ${errorMessage(e)}`, { cause: e });
  }
  const { body, title } = stripFrontMatter(raw);
  const resolvedTitle = title ?? firstHeading(body);
  return {
    path: toSourcePath(root, abs),
    absolutePath: abs,
    text: body,
    size,
    ...(resolvedTitle ? { title: resolvedTitle } : {}),
  };
}

/**
 * Walk the documentation root and load every markdown file. Any read error
 * aborts the whole load.
 */
export async function loadDocuments(root: string, opts: LoadOptions = {}): Promise<Document[]> {
  const files = await discoverMarkdownFiles(root, opts);
  const docs: Document[] = [];
  for (const abs of files) {
    docs.push(await loadDocument(root, abs));
    if (opts.verbose && docs.length % 100 === 0) {
      console.error(`[docs-chat][verbose] Loaded ${docs.length}/${files.length} files`);
    }
  }
  console.error(`[docs-chat] Loaded ${docs.length} markdown files from ${root}`);
  return docs;
}
