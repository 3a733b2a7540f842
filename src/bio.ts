import { InvalidRequestError } from "./errors";

export type LabeledSpan = {
  label: string;
  start: number;
  end: number;
};

const OUTSIDE_TAGS = new Set(["O", "_"]);

function isBegin(tag: string | undefined): boolean {
  return tag !== undefined && tag.startsWith("B-");
}

// Label carried by a tag, or "" when the token is outside any span.
// Tags without a B-/I- prefix are taken as bare labels.
export function bioLabel(tag: string | undefined): string {
  if (tag === undefined || OUTSIDE_TAGS.has(tag)) return "";
  if (tag.startsWith("B-") || tag.startsWith("I-")) return tag.slice(2);
  return tag;
}

export function bioToSpans(tags: readonly string[]): LabeledSpan[] {
  const spans: LabeledSpan[] = [];
  let open: LabeledSpan | null = null;

  for (let i = 0; i < tags.length; i += 1) {
    const tag = tags[i]!;
    const label = bioLabel(tag);
    if (!label) {
      open = null;
      continue;
    }

    if (isBegin(tag) || open === null || label !== bioLabel(tags[i - 1])) {
      open = { label, start: i, end: i + 1 };
      spans.push(open);
    }

    const next = tags[i + 1];
    if (i === tags.length - 1 || isBegin(next) || label !== bioLabel(next)) {
      open.end = i + 1;
      open = null;
    }
  }

  return spans;
}

export function spansToBio(spans: readonly LabeledSpan[], length: number): string[] {
  if (!Number.isInteger(length) || length < 0) {
    throw new InvalidRequestError(`invalid sequence length: ${length}`);
  }
  const tags = new Array<string>(length).fill("O");
  const covered = new Array<boolean>(length).fill(false);

  for (const span of spans) {
    const { label, start, end } = span;
    if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || start >= end || end > length) {
      throw new InvalidRequestError(`invalid span (${label}, ${start}, ${end}) for sequence length ${length}`);
    }
    for (let i = start; i < end; i += 1) {
      if (covered[i]) throw new InvalidRequestError(`overlapping span (${label}, ${start}, ${end}) at position ${i}`);
      covered[i] = true;
      tags[i] = i === start ? `B-${label}` : `I-${label}`;
    }
  }

  return tags;
}
