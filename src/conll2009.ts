import type { ConllBlock } from "./conll_blocks";
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
import { ROOT_HEAD, createWord } from "./words";

const COLUMN = {
  id: 0,
  form: 1,
  lemma: 2,
  pos: 4,
  head: 8,
  deprel: 10,
  fillPred: 12,
  pred: 13,
} as const;
const FIRST_ROLE_COLUMN = 14;
const PLACEHOLDER = "_";

function parseHead(value: string): number | undefined | null {
  if (value === PLACEHOLDER) return undefined;
  if (!/^\d+$/.test(value)) return null;
  const head = Number(value);
  return head === 0 ? ROOT_HEAD : head - 1;
}

export function parseConll2009Block(block: ConllBlock, context: ParseContext): SrlSentence {
  const rows = block.lines.map((line) => line.text.trim().split(/\s+/g));
  const width = rows[0]!.length;
  const slots: Slot[] = [];

  // Pass 1: words, dependency heads and predicates.
  for (let i = 0; i < rows.length; i += 1) {
    const columns = rows[i]!;
    const { lineNumber } = block.lines[i]!;
    if (columns.length < FIRST_ROLE_COLUMN) {
      throw corpusError(context, lineNumber, `expected at least ${FIRST_ROLE_COLUMN} columns, found ${columns.length}`);
    }
    if (columns.length !== width) {
      throw corpusError(context, lineNumber, `expected ${width} columns like the first token line, found ${columns.length}`);
    }
    const id = columns[COLUMN.id]!;
    if (id !== String(i + 1)) throw corpusError(context, lineNumber, `expected token id ${i + 1}, found ${id}`);
    const head = parseHead(columns[COLUMN.head]!);
    if (head === null) throw corpusError(context, lineNumber, `invalid head: ${columns[COLUMN.head]}`);

    const deprel = columns[COLUMN.deprel]!;
    const word = createWord({
      text: columns[COLUMN.form]!,
      index: i,
      lemma: columns[COLUMN.lemma],
      pos: columns[COLUMN.pos],
      dep: deprel !== PLACEHOLDER ? deprel : undefined,
      head,
    });
    slots.push(columns[COLUMN.fillPred] === "Y" ? promoteToPredicate(word, columns[COLUMN.pred]) : word);
  }

  const sentence = new SrlSentence(slots);
  const predicates = sentence.predicates();
  const roleCount = width - FIRST_ROLE_COLUMN;
  if (roleCount !== predicates.length) {
    throw corpusError(context, block.startLine, `found ${roleCount} role columns for ${predicates.length} predicates`);
  }

  // Pass 2: every non-placeholder role is a single-token argument.
  for (let i = 0; i < rows.length; i += 1) {
    const roles = rows[i]!.slice(FIRST_ROLE_COLUMN);
    for (let c = 0; c < roles.length; c += 1) {
      const role = roles[c]!;
      if (role !== PLACEHOLDER) sentence.addArgument(predicates[c]!, role, i, i + 1);
    }
  }
  return sentence;
}

export const conll2009Dialect: SrlDialect = {
  name: "conll2009",
  fileSuffix: ".txt",
  parseBlock: parseConll2009Block,
};

export function parseConll2009(text: string, options?: ParseTextOptions): SrlSentence[] {
  return parseWithDialect(conll2009Dialect, text, options);
}

export function readConll2009(path: string, options?: ReaderOptions): Promise<SrlCorpus> {
  return readWithDialect(conll2009Dialect, path, options);
}
