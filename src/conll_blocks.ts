import { createReadStream } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import { createInterface } from "node:readline";

export type ConllLine = {
  text: string;
  lineNumber: number;
};

export type ConllBlock = {
  lines: ConllLine[];
  comments: ConllLine[];
  startLine: number;
};

class BlockBuilder {
  private lines: ConllLine[] = [];
  private comments: ConllLine[] = [];
  private startLine = 0;

  // Returns the block closed by a blank line, if any.
  push(raw: string, lineNumber: number): ConllBlock | null {
    const text = raw.replace(/\r$/, "");
    const trimmed = text.trim();
    if (!trimmed) return this.flush();

    if (this.startLine === 0) this.startLine = lineNumber;
    if (trimmed.startsWith("#")) this.comments.push({ text: trimmed, lineNumber });
    else this.lines.push({ text, lineNumber });
    return null;
  }

  flush(): ConllBlock | null {
    const block = this.lines.length > 0 ? { lines: this.lines, comments: this.comments, startLine: this.startLine } : null;
    this.lines = [];
    this.comments = [];
    this.startLine = 0;
    return block;
  }
}

export function splitConllBlocks(text: string): ConllBlock[] {
  const builder = new BlockBuilder();
  const out: ConllBlock[] = [];
  const rows = text.split(/\n/g);
  for (let i = 0; i < rows.length; i += 1) {
    const block = builder.push(rows[i]!, i + 1);
    if (block) out.push(block);
  }
  const last = builder.flush();
  if (last) out.push(last);
  return out;
}

export async function* readConllBlocks(filePath: string): AsyncGenerator<ConllBlock> {
  const builder = new BlockBuilder();
  const input = createReadStream(filePath, { encoding: "utf8" });
  const rl = createInterface({ input, crlfDelay: Infinity });

  let lineNumber = 0;
  try {
    for await (const raw of rl) {
      lineNumber += 1;
      const block = builder.push(raw, lineNumber);
      if (block) yield block;
    }
  } finally {
    rl.close();
    input.destroy();
  }

  const last = builder.flush();
  if (last) yield last;
}

export function parseCommentMetadata(comments: readonly ConllLine[]): Record<string, string> {
  const metadata: Record<string, string> = {};
  for (const comment of comments) {
    const match = comment.text.match(/^#\s*([^=\s][^=]*?)\s*=\s*(.*)$/);
    if (!match) continue;
    metadata[match[1]!] = match[2]!.trim();
  }
  return metadata;
}

async function walk(dir: string, suffix: string, out: string[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) await walk(full, suffix, out);
    else if (entry.isFile() && entry.name.endsWith(suffix)) out.push(full);
  }
}

export async function listCorpusFiles(path: string, suffix: string): Promise<string[]> {
  const target = resolve(path);
  const info = await stat(target);
  if (!info.isDirectory()) return [target];

  const files: string[] = [];
  await walk(target, suffix, files);
  return files.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}
