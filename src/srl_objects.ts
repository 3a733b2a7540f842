import { spansToBio } from "./bio";
import { InvalidRequestError, NotAPredicateError } from "./errors";
import { Sentence } from "./sentence";
import type { Word } from "./words";

export type Predicate = Omit<Word, "kind"> & {
  readonly kind: "predicate";
  readonly sense?: string;
  readonly arguments: Argument[];
  score: number;
};

export type Slot = Word | Predicate;

export type PredicateDraft = Omit<Predicate, "index"> & {
  readonly index?: number;
};

export type ArgumentFormat = "span" | "bio";

export function isPredicate(slot: Slot): slot is Predicate {
  return slot.kind === "predicate";
}

export function promoteToPredicate(word: Word, sense?: string): Predicate {
  const { kind: _kind, ...shared } = word;
  return { ...shared, kind: "predicate", sense, arguments: [], score: 0 };
}

// Reason a span cannot be placed in a sentence of the given length, or null.
export function checkSpan(start: number, end: number, length: number): string | null {
  if (!Number.isInteger(start) || !Number.isInteger(end)) return `span bounds must be integers, got [${start}, ${end})`;
  if (start < 0 || start >= end || end > length) {
    return `span [${start}, ${end}) does not fit a sentence of length ${length}`;
  }
  return null;
}

export class Argument {
  constructor(
    readonly role: string,
    readonly predicate: Predicate,
    private readonly sentence: Sentence<Slot>,
    readonly start: number,
    readonly end: number,
  ) {
    const problem = checkSpan(start, end, sentence.length);
    if (problem) throw new InvalidRequestError(`argument ${role}: ${problem}`);
  }

  get words(): Slot[] {
    return this.sentence.slice(this.start, this.end);
  }

  get span(): [number, number] {
    return [this.start, this.end];
  }

  get bioTag(): string[] {
    const tags = [`B-${this.role}`];
    for (let i = this.start + 1; i < this.end; i += 1) tags.push(`I-${this.role}`);
    return tags;
  }

  toString(): string {
    return `(${this.role}, ${this.start}, ${this.end})`;
  }
}

export class SrlSentence extends Sentence<Slot> {
  addPredicate(predicate: PredicateDraft, index?: number): Predicate {
    const target = index ?? predicate.index;
    if (target === undefined) throw new InvalidRequestError("cannot infer index of predicate");
    this.checkIndex(target);
    const placed: Predicate = { ...predicate, index: target };
    this.slots[target] = placed;
    return placed;
  }

  getPredicate(index: number): Predicate {
    const slot = this.get(index);
    switch (slot.kind) {
      case "predicate":
        return slot;
      case "word":
        throw new NotAPredicateError(index);
    }
  }

  predicates(): Predicate[] {
    return this.slots.filter(isPredicate);
  }

  addArgument(predicate: Predicate, role: string, start: number, end: number): Argument {
    const argument = new Argument(role, predicate, this, start, end);
    predicate.arguments.push(argument);
    return argument;
  }

  getPredicateArguments(predicate: Predicate | number, format?: "span"): Argument[];
  getPredicateArguments(predicate: Predicate | number, format: "bio"): string[];
  getPredicateArguments(predicate: Predicate | number, format: string): Argument[] | string[];
  getPredicateArguments(predicate: Predicate | number, format: string = "span"): Argument[] | string[] {
    const index = typeof predicate === "number" ? predicate : predicate.index;
    const { arguments: args } = this.getPredicate(index);
    if (format === "span") return args;
    if (format === "bio") {
      return spansToBio(
        args.map((arg) => ({ label: arg.role, start: arg.start, end: arg.end })),
        this.length,
      );
    }
    throw new InvalidRequestError(`unknown format: ${format}. Available formats are: span, bio`);
  }
}
