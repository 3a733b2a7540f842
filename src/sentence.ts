import { SentenceIndexError } from "./errors";
import type { Word } from "./words";

export type TokenSlot = {
  readonly text: string;
};

export class Sentence<TSlot extends TokenSlot = Word> implements Iterable<TSlot> {
  protected readonly slots: TSlot[];
  id: string | undefined;

  constructor(slots: readonly TSlot[] = [], id?: string) {
    this.slots = [...slots];
    this.id = id;
  }

  get length(): number {
    return this.slots.length;
  }

  get(index: number): TSlot {
    this.checkIndex(index);
    return this.slots[index]!;
  }

  set(index: number, slot: TSlot): void {
    this.checkIndex(index);
    this.slots[index] = slot;
  }

  append(slot: TSlot): void {
    this.slots.push(slot);
  }

  slice(start = 0, end = this.slots.length): TSlot[] {
    return this.slots.slice(start, end);
  }

  words(): string[] {
    return this.slots.map((slot) => slot.text);
  }

  [Symbol.iterator](): Iterator<TSlot> {
    return this.slots[Symbol.iterator]();
  }

  toString(): string {
    return `[${this.words().join(", ")}]`;
  }

  protected checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.slots.length) {
      throw new SentenceIndexError(index, this.slots.length);
    }
  }
}
