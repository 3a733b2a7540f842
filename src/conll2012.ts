import { bioToSpans } from "./bio";
import type { ConllBlock, ConllLine } from "./conll_blocks";
import type { ReaderOptions } from "./config";
import {
  type ParseContext,
  type ParseTextOptions,
  type SrlCorpus,
  type SrlDialect,
  corpusError,
  parseWithDialect,
  readWithDialect,
} from "./srl_reader";
import { type Slot, SrlSentence, promoteToPredicate } from "./srl_objects";
import { createWord, unescapeToken } from "./words";

// 0 document id, 1 part, 2 token index, 3 word, 4 pos, 5 parse bit, 6 frame id / lemma,
// 7 sense, 8 word sense, 9 speaker, 10 entities, 11..n-2 roles, n-1 coreference
const COLUMN = {
  documentId: 0,
  part: 1,
  tokenIndex: 2,
  word: 3,
  pos: 4,
  frame: 6,
  sense: 7,
} as const;
const FIRST_ROLE_COLUMN = 11;
const MIN_COLUMNS = 12;
const PLACEHOLDER = "-";
const PREDICATE_SELF = "V";

type BracketState = {
  open: string | null;
  tags: string[];
};

function splitColumns(line: ConllLine): string[] {
  return line.text.trim().split(/\s+/g);
}

function stripBrackets(annotation: string): string {
  return annotation.replace(/^[()*]+|[()*]+$/g, "");
}

// One step of the bracket state machine for a single role column.
function pushBracketTag(state: BracketState, annotation: string, line: ConllLine, context: ParseContext): void {
  const opens = annotation.split("(").length - 1;
  const closes = annotation.includes(")");
  if (opens > 1) throw corpusError(context, line.lineNumber, `nested role spans are not supported: ${annotation}`);

  if (opens === 1) {
    if (state.open !== null) {
      throw corpusError(context, line.lineNumber, `role span opened inside open span ${state.open}: ${annotation}`);
    }
    const label = stripBrackets(annotation);
    if (!label) throw corpusError(context, line.lineNumber, `empty role label: ${annotation}`);
    state.tags.push(`B-${label}`);
    state.open = label;
  } else if (state.open !== null) {
    state.tags.push(`I-${state.open}`);
  } else {
    if (closes) throw corpusError(context, line.lineNumber, `role span closed without opening: ${annotation}`);
    state.tags.push("O");
  }

  if (closes) state.open = null;
}

export function conll2012Sense(frame: string, sense: string): string {
  return /^\d+$/.test(frame) ? `${frame}.${sense}` : sense;
}

export function parseConll2012Block(block: ConllBlock, context: ParseContext): SrlSentence {
  const rows = block.lines.map(splitColumns);
  const width = rows[0]!.length;
  const roleCount = width - 1 - FIRST_ROLE_COLUMN;
  const states: BracketState[] = Array.from({ length: Math.max(roleCount, 0) }, () => ({ open: null, tags: [] }));
  const slots: Slot[] = [];

  for (let i = 0; i < rows.length; i += 1) {
    const columns = rows[i]!;
    const line = block.lines[i]!;
    if (columns.length < MIN_COLUMNS) {
      throw corpusError(context, line.lineNumber, `expected at least ${MIN_COLUMNS} columns, found ${columns.length}`);
    }
    if (columns.length !== width) {
      throw corpusError(context, line.lineNumber, `expected ${width} columns like the first token line, found ${columns.length}`);
    }
    if (!/^\d+$/.test(columns[COLUMN.tokenIndex]!)) {
      throw corpusError(context, line.lineNumber, `token index is not an integer: ${columns[COLUMN.tokenIndex]}`);
    }

    const frame = columns[COLUMN.frame]!;
    const sense = columns[COLUMN.sense]!;
    const word = createWord({
      text: unescapeToken(columns[COLUMN.word]!),
      index: i,
      lemma: frame !== PLACEHOLDER ? frame : undefined,
      pos: columns[COLUMN.pos],
    });
    slots.push(sense !== PLACEHOLDER ? promoteToPredicate(word, conll2012Sense(frame, sense)) : word);

    for (let c = 0; c < states.length; c += 1) {
      pushBracketTag(states[c]!, columns[FIRST_ROLE_COLUMN + c]!, line, context);
    }
  }

  const lastLine = block.lines[block.lines.length - 1]!;
  for (const state of states) {
    if (state.open !== null) throw corpusError(context, lastLine.lineNumber, `role span ${state.open} is never closed`);
  }

  const first = rows[0]!;
  const sentence = new SrlSentence(slots, `${first[COLUMN.documentId]}_${first[COLUMN.part]}`);
  const predicates = sentence.predicates();
  if (predicates.length !== states.length) {
    throw corpusError(
      context,
      block.startLine,
      `found ${states.length} role columns for ${predicates.length} predicates`,
    );
  }

  for (let c = 0; c < states.length; c += 1) {
    const predicate = predicates[c]!;
    for (const span of bioToSpans(states[c]!.tags)) {
      if (span.label === PREDICATE_SELF) continue;
      sentence.addArgument(predicate, span.label, span.start, span.end);
    }
  }
  return sentence;
}

export const conll2012Dialect: SrlDialect = {
  name: "conll2012",
  fileSuffix: ".gold_conll",
  parseBlock: parseConll2012Block,
};

export function parseConll2012(text: string, options?: ParseTextOptions): SrlSentence[] {
  return parseWithDialect(conll2012Dialect, text, options);
}

export function readConll2012(path: string, options?: ReaderOptions): Promise<SrlCorpus> {
  return readWithDialect(conll2012Dialect, path, options);
}
