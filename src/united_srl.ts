import { type LabeledSpan, bioToSpans } from "./bio";
import { type ConllBlock, parseCommentMetadata } from "./conll_blocks";
import type { ReaderOptions } from "./config";
import { logger } from "./logger";
import {
  type ArgumentDropped,
  type ParseContext,
  type ParseTextOptions,
  type SrlCorpus,
  type SrlDialect,
  corpusError,
  parseWithDialect,
  readWithDialect,
} from "./srl_reader";
import { type Slot, SrlSentence, checkSpan, promoteToPredicate } from "./srl_objects";
import { createWord, unescapeToken } from "./words";

const COLUMN = {
  id: 0,
  form: 1,
  lemma: 2,
  frame: 3,
} as const;
const FIRST_ROLE_COLUMN = 4;
const PLACEHOLDER = "_";
const PREDICATE_SELF = new Set(["V", "B-V"]);

// Some releases lost the double quote token, leaving a blank form.
function normalizeForm(form: string): string {
  if (form === "" || form === " ") return '"';
  return unescapeToken(form);
}

function isSpanEncoded(roles: readonly string[]): boolean {
  return roles.some((role) => role !== "B-V" && role.startsWith("B-"));
}

export function unitedRoleSpans(roles: readonly string[]): LabeledSpan[] {
  if (isSpanEncoded(roles)) return bioToSpans(roles);
  const spans: LabeledSpan[] = [];
  roles.forEach((role, i) => {
    if (role !== PLACEHOLDER) spans.push({ label: role, start: i, end: i + 1 });
  });
  return spans;
}

export function unitedSentenceId(metadata: Record<string, string>): string | undefined {
  const documentId = metadata["document_id"];
  const sentenceId = metadata["sentence_id"];
  if (documentId === undefined || sentenceId === undefined) return undefined;
  return `${documentId}_${sentenceId}`;
}

function dropArgument(context: ParseContext, dropped: ArgumentDropped): void {
  logger.warn("dropping unresolvable argument", dropped);
  context.report(dropped);
}

export function parseUnitedSrlBlock(block: ConllBlock, context: ParseContext): SrlSentence {
  const rows = block.lines.map((line) => line.text.split("\t"));
  const slots: Slot[] = [];
  const roleCount = rows[0]!.length - FIRST_ROLE_COLUMN;

  for (let i = 0; i < rows.length; i += 1) {
    const columns = rows[i]!;
    const { lineNumber } = block.lines[i]!;
    if (columns.length < FIRST_ROLE_COLUMN) {
      throw corpusError(context, lineNumber, `expected at least ${FIRST_ROLE_COLUMN} columns, found ${columns.length}`);
    }
    if (columns.length - FIRST_ROLE_COLUMN !== roleCount) {
      throw corpusError(context, lineNumber, `expected ${roleCount} role columns, found ${columns.length - FIRST_ROLE_COLUMN}`);
    }
    if (!/^\d+$/.test(columns[COLUMN.id]!)) throw corpusError(context, lineNumber, `token id is not an integer: ${columns[COLUMN.id]}`);

    const lemma = columns[COLUMN.lemma]!;
    const frame = columns[COLUMN.frame]!;
    const word = createWord({
      text: normalizeForm(columns[COLUMN.form]!),
      index: i,
      lemma: lemma !== PLACEHOLDER ? lemma : undefined,
    });
    slots.push(frame !== PLACEHOLDER ? promoteToPredicate(word, frame) : word);
  }

  const sentence = new SrlSentence(slots, unitedSentenceId(parseCommentMetadata(block.comments)));
  const predicates = sentence.predicates();

  for (let c = 0; c < roleCount; c += 1) {
    const roles = rows.map((columns) => columns[FIRST_ROLE_COLUMN + c]!);
    const predicate = predicates[c];

    for (const span of unitedRoleSpans(roles)) {
      if (PREDICATE_SELF.has(span.label)) continue;
      const problem = predicate ? checkSpan(span.start, span.end, sentence.length) : `role column ${c} has no predicate`;
      if (predicate && problem === null) {
        sentence.addArgument(predicate, span.label, span.start, span.end);
      } else {
        dropArgument(context, {
          kind: "argument-dropped",
          source: context.source,
          line: block.lines[span.start]?.lineNumber ?? block.startLine,
          sentenceId: sentence.id,
          predicateColumn: c,
          role: span.label,
          start: span.start,
          end: span.end,
          reason: problem ?? "unresolvable span",
        });
      }
    }
  }
  return sentence;
}

export const unitedSrlDialect: SrlDialect = {
  name: "united",
  fileSuffix: ".conllu",
  parseBlock: parseUnitedSrlBlock,
};

export function parseUnitedSrl(text: string, options?: ParseTextOptions): SrlSentence[] {
  return parseWithDialect(unitedSrlDialect, text, options);
}

export function readUnitedSrl(path: string, options?: ReaderOptions): Promise<SrlCorpus> {
  return readWithDialect(unitedSrlDialect, path, options);
}
