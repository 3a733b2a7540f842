import { fileURLToPath } from "node:url";
import { expect, test } from "vitest";
import {
  CorpusFormatError,
  InvalidRequestError,
  SRL_DIALECTS,
  parseSrlText,
  readConll2009,
  readConll2012,
  readSrlCorpus,
  readUnitedSrl,
  srlDialect,
  srlFormats,
} from "../index";

const fixtures = fileURLToPath(new URL("./fixtures/", import.meta.url));

test("registry exposes one dialect per format", () => {
  expect(srlFormats()).toEqual(["conll2009", "conll2012", "united"]);
  expect(srlDialect("united")).toBe(SRL_DIALECTS.united);
  expect(SRL_DIALECTS.conll2012.fileSuffix).toBe(".gold_conll");
  expect(() => srlDialect("conll2005")).toThrow(InvalidRequestError);
});

test("directory reading yields every sentence in sorted file order", async () => {
  const corpus = await readConll2012(`${fixtures}conll2012`);
  expect(corpus.sentences.map((sentence) => sentence.id)).toEqual([
    "nw/a/00/a_0001_0",
    "nw/b/00/b_0001_0",
    "nw/b/00/b_0001_0",
  ]);
  expect(corpus.sentences.map((sentence) => sentence.words()[0])).toEqual(["Dogs", "Birds", "Cats"]);
  expect(corpus.diagnostics).toEqual([]);
});

test("parallel file reading keeps first-encountered order", async () => {
  const sequential = await readConll2012(`${fixtures}conll2012`);
  const parallel = await readConll2012(`${fixtures}conll2012`, { concurrency: 4 });
  expect(parallel.sentences.map(String)).toEqual(sequential.sentences.map(String));
});

test("fileSuffix option overrides the dialect suffix", async () => {
  const corpus = await readConll2012(`${fixtures}conll2012`, { fileSuffix: ".none" });
  expect(corpus.sentences).toEqual([]);
});

test("CoNLL-2009 files read end to end", async () => {
  const corpus = await readConll2009(`${fixtures}conll2009/sample.txt`);
  expect(corpus.sentences.length).toBe(2);

  const [first, second] = corpus.sentences;
  const likes = first?.predicates()[0];
  expect(likes?.text).toBe("likes");
  expect(likes?.sense).toBe("like.01");
  expect(likes?.arguments.map((arg) => ({ role: arg.role, start: arg.start, end: arg.end }))).toEqual([
    { role: "A0", start: 0, end: 1 },
  ]);
  expect(second?.predicates().map((p) => p.arguments.map(String))).toEqual([["(A0, 0, 1)", "(A1, 3, 4)"], ["(A0, 0, 1)"]]);
});

test("United files read sentence ids from metadata", async () => {
  const corpus = await readUnitedSrl(`${fixtures}united`);
  expect(corpus.sentences.map((sentence) => sentence.id)).toEqual(["doc7_1", "doc7_2"]);
  expect(corpus.sentences.map((sentence) => sentence.predicates().map((p) => p.arguments.map(String)))).toEqual([
    [["(ARGM-LOC, 2, 3)"]],
    [["(ARG1, 0, 1)"]],
  ]);
});

test("malformed files reject with the file and line", async () => {
  const file = `${fixtures}malformed/broken.gold_conll`;
  await expect(readSrlCorpus(file, "conll2012")).rejects.toThrow(`${file}:2: expected at least 12 columns, found 4`);
  await expect(readSrlCorpus(file, "conll2012")).rejects.toBeInstanceOf(CorpusFormatError);
});

test("skip mode keeps reading past malformed sentences", async () => {
  const file = `${fixtures}malformed/broken.gold_conll`;
  const corpus = await readSrlCorpus(file, "conll2012", { onMalformed: "skip" });
  expect(corpus.sentences).toEqual([]);
  expect(corpus.diagnostics).toEqual([
    { kind: "sentence-skipped", source: file, line: 2, reason: "expected at least 12 columns, found 4" },
  ]);
});

test("unknown formats and invalid options are rejected", async () => {
  await expect(readSrlCorpus(fixtures, "propbank")).rejects.toThrow("unknown SRL format: propbank");
  await expect(readSrlCorpus(fixtures, "united", { concurrency: 0 })).rejects.toThrow(InvalidRequestError);
});

test("parseSrlText dispatches to the dialect parser", () => {
  const text = ["0\tWe\twe\t_\tARG0", "1\twin\twin\twin.01\tB-V"].join("\n");
  const [sentence] = parseSrlText(text, "united");
  expect(sentence?.getPredicateArguments(1, "bio")).toEqual(["B-ARG0", "O"]);
});
