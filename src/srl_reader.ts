import { type ConllBlock, listCorpusFiles, readConllBlocks, splitConllBlocks } from "./conll_blocks";
import { type ReaderOptions, type ResolvedReaderOptions, resolveReaderOptions } from "./config";
import { CorpusFormatError } from "./errors";
import { logger } from "./logger";
import type { SrlSentence } from "./srl_objects";

export type ArgumentDropped = {
  kind: "argument-dropped";
  source: string;
  line: number;
  sentenceId?: string;
  predicateColumn: number;
  role: string;
  start: number;
  end: number;
  reason: string;
};

export type SentenceSkipped = {
  kind: "sentence-skipped";
  source: string;
  line: number;
  reason: string;
};

export type SrlDiagnostic = ArgumentDropped | SentenceSkipped;

export type ParseContext = {
  source: string;
  report: (diagnostic: SrlDiagnostic) => void;
};

export type SrlDialect = {
  name: string;
  fileSuffix: string;
  parseBlock: (block: ConllBlock, context: ParseContext) => SrlSentence;
};

export type SrlCorpus = {
  sentences: SrlSentence[];
  diagnostics: SrlDiagnostic[];
};

export type ParseTextOptions = ReaderOptions & {
  onDiagnostic?: (diagnostic: SrlDiagnostic) => void;
};

export function corpusError(context: ParseContext, line: number, reason: string): CorpusFormatError {
  return new CorpusFormatError(context.source, line, reason);
}

function parseOrSkip(
  dialect: SrlDialect,
  block: ConllBlock,
  context: ParseContext,
  options: ResolvedReaderOptions,
): SrlSentence | null {
  try {
    return dialect.parseBlock(block, context);
  } catch (error) {
    if (!(error instanceof CorpusFormatError)) throw error;
    if (options.onMalformed === "throw") {
      logger.error("corpus format error", { dialect: dialect.name, source: error.source, line: error.line, reason: error.reason });
      throw error;
    }
    logger.warn("skipping malformed sentence", { dialect: dialect.name, source: error.source, line: error.line, reason: error.reason });
    context.report({ kind: "sentence-skipped", source: error.source, line: error.line, reason: error.reason });
    return null;
  }
}

export function parseWithDialect(dialect: SrlDialect, text: string, options: ParseTextOptions = {}): SrlSentence[] {
  const { onDiagnostic, ...readerOptions } = options;
  const resolved = resolveReaderOptions(readerOptions);
  const context: ParseContext = {
    source: resolved.source,
    report: (diagnostic) => onDiagnostic?.(diagnostic),
  };

  const sentences: SrlSentence[] = [];
  for (const block of splitConllBlocks(text)) {
    const sentence = parseOrSkip(dialect, block, context, resolved);
    if (sentence) sentences.push(sentence);
  }
  return sentences;
}

async function readFile(dialect: SrlDialect, filePath: string, options: ResolvedReaderOptions): Promise<SrlCorpus> {
  const out: SrlCorpus = { sentences: [], diagnostics: [] };
  const context: ParseContext = {
    source: filePath,
    report: (diagnostic) => out.diagnostics.push(diagnostic),
  };

  logger.debug("reading corpus file", { dialect: dialect.name, file: filePath });
  for await (const block of readConllBlocks(filePath)) {
    const sentence = parseOrSkip(dialect, block, context, options);
    if (sentence) out.sentences.push(sentence);
  }
  logger.debug("finished corpus file", {
    dialect: dialect.name,
    file: filePath,
    sentences: out.sentences.length,
    diagnostics: out.diagnostics.length,
  });
  return out;
}

export async function readWithDialect(dialect: SrlDialect, path: string, options: ReaderOptions = {}): Promise<SrlCorpus> {
  const resolved = resolveReaderOptions(options);
  const files = await listCorpusFiles(path, resolved.fileSuffix ?? dialect.fileSuffix);
  const corpus: SrlCorpus = { sentences: [], diagnostics: [] };

  for (let i = 0; i < files.length; i += resolved.concurrency) {
    const batch = files.slice(i, i + resolved.concurrency);
    const results = await Promise.all(batch.map((file) => readFile(dialect, file, resolved)));
    for (const result of results) {
      for (const sentence of result.sentences) corpus.sentences.push(sentence);
      for (const diagnostic of result.diagnostics) corpus.diagnostics.push(diagnostic);
    }
  }

  logger.info("read corpus", { dialect: dialect.name, path, files: files.length, sentences: corpus.sentences.length });
  return corpus;
}
