import { afterEach, expect, test, vi } from "vitest";
import { type SrlDiagnostic, logger, parseUnitedSrl, unitedRoleSpans, unitedSentenceId } from "../index";

function row(...columns: string[]): string {
  return columns.join("\t");
}

afterEach(() => {
  vi.restoreAllMocks();
});

test("span-encoded role columns decode through BIO spans", () => {
  const text = [
    "# document_id = news_12",
    "# sentence_id = 4",
    row("0", "The", "the", "_", "B-ARG0", "_"),
    row("1", "cat", "cat", "_", "I-ARG0", "_"),
    row("2", "wants", "want", "want.01", "B-V", "_"),
    row("3", "to", "to", "_", "B-ARG1", "_"),
    row("4", "eat", "eat", "eat.01", "I-ARG1", "B-V"),
    row("5", "fish", "fish", "_", "I-ARG1", "B-ARG1"),
  ].join("\n");
  const [sentence] = parseUnitedSrl(text);

  expect(sentence?.id).toBe("news_12_4");
  const [wants, eat] = sentence?.predicates() ?? [];
  expect(wants?.sense).toBe("want.01");
  expect(wants?.arguments.map(String)).toEqual(["(ARG0, 0, 2)", "(ARG1, 3, 6)"]);
  expect(eat?.arguments.map(String)).toEqual(["(ARG1, 5, 6)"]);
});

test("dependency-encoded role columns become single-token arguments", () => {
  const text = [
    row("0", "Rain", "rain", "_", "ARG1"),
    row("1", "fell", "fall", "fall.01", "B-V"),
    row("2", "on", "on", "_", "_"),
    row("3", "Paris", "Paris", "_", "ARGM-LOC"),
  ].join("\n");
  const [sentence] = parseUnitedSrl(text);
  expect(sentence?.getPredicate(1).arguments.map(String)).toEqual(["(ARG1, 0, 1)", "(ARGM-LOC, 3, 4)"]);
  expect(sentence?.id).toBeUndefined();
});

test("unitedRoleSpans ignores the predicate marker when classifying a column", () => {
  expect(unitedRoleSpans(["A0", "B-V", "_"])).toEqual([
    { label: "A0", start: 0, end: 1 },
    { label: "B-V", start: 1, end: 2 },
  ]);
  expect(unitedRoleSpans(["B-A0", "I-A0", "B-V"])).toEqual([
    { label: "A0", start: 0, end: 2 },
    { label: "V", start: 2, end: 3 },
  ]);
});

test("blank forms are read as double quotes and escapes are decoded", () => {
  const text = [
    row("0", " ", "_", "_"),
    row("1", "-LRB-", "_", "_"),
    row("2", "hi", "hi", "_"),
    row("3", "-RRB-", "_", "_"),
    row("4", "", "_", "_"),
  ].join("\n");
  const [sentence] = parseUnitedSrl(text);
  expect(sentence?.words()).toEqual(['"', "(", "hi", ")", '"']);
  expect(sentence?.get(2).lemma).toBe("hi");
  expect(sentence?.get(0).lemma).toBeUndefined();
  expect(sentence?.predicates()).toEqual([]);
});

test("arguments of role columns without a predicate are dropped and reported", () => {
  const warn = vi.spyOn(logger, "warn");
  const text = [
    "# document_id = d1",
    "# sentence_id = 7",
    row("0", "John", "John", "_", "ARG0", "ARG0"),
    row("1", "runs", "run", "run.01", "B-V", "_"),
  ].join("\n");
  const diagnostics: SrlDiagnostic[] = [];
  const [sentence] = parseUnitedSrl(text, { onDiagnostic: (d) => diagnostics.push(d) });

  expect(sentence?.getPredicate(1).arguments.map(String)).toEqual(["(ARG0, 0, 1)"]);
  expect(diagnostics).toEqual([
    {
      kind: "argument-dropped",
      source: "<text>",
      line: 3,
      sentenceId: "d1_7",
      predicateColumn: 1,
      role: "ARG0",
      start: 0,
      end: 1,
      reason: "role column 1 has no predicate",
    },
  ]);
  expect(warn).toHaveBeenCalledWith("dropping unresolvable argument", expect.objectContaining({ role: "ARG0", line: 3 }));
});

test("lines with missing columns raise corpus format errors", () => {
  expect(() => parseUnitedSrl(row("0", "x", "x"))).toThrow("<text>:1: expected at least 4 columns, found 3");
  expect(() => parseUnitedSrl([row("0", "a", "a", "_", "_"), row("1", "b", "b", "_")].join("\n"))).toThrow(
    "<text>:2: expected 1 role columns, found 0",
  );
  expect(() => parseUnitedSrl(row("1-2", "don't", "_", "_"))).toThrow("<text>:1: token id is not an integer: 1-2");
});

test("unitedSentenceId needs both metadata ids", () => {
  expect(unitedSentenceId({ document_id: "a", sentence_id: "3" })).toBe("a_3");
  expect(unitedSentenceId({ document_id: "a" })).toBeUndefined();
});
