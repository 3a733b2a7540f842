export type Word = {
  readonly kind: "word";
  readonly text: string;
  readonly index: number;
  readonly startChar?: number;
  readonly endChar?: number;
  readonly lemma?: string;
  readonly pos?: string;
  readonly dep?: string;
  // Dependency head as a 0-based token index, ROOT_HEAD for the root.
  head?: number;
};

export type WordInit = Omit<Word, "kind">;

export const ROOT_HEAD = -1;

export function createWord(init: WordInit): Word {
  return { kind: "word", ...init };
}

// Bracket and quote escapes used by treebank-derived corpora.
const TOKEN_ESCAPES: ReadonlyMap<string, string> = new Map([
  ["-LRB-", "("],
  ["-RRB-", ")"],
  ["-LSB-", "["],
  ["-RSB-", "]"],
  ["-LCB-", "{"],
  ["-RCB-", "}"],
  ["``", '"'],
  ["''", '"'],
]);

export function unescapeToken(text: string): string {
  return TOKEN_ESCAPES.get(text) ?? text;
}
