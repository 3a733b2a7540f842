export { bioLabel, bioToSpans, spansToBio } from "./src/bio";
export type { LabeledSpan } from "./src/bio";

export { ROOT_HEAD, createWord, unescapeToken } from "./src/words";
export type { Word, WordInit } from "./src/words";

export { Sentence } from "./src/sentence";
export type { TokenSlot } from "./src/sentence";

export { Argument, SrlSentence, checkSpan, isPredicate, promoteToPredicate } from "./src/srl_objects";
export type { ArgumentFormat, Predicate, PredicateDraft, Slot } from "./src/srl_objects";

export { CorpusFormatError, InvalidRequestError, NotAPredicateError, SentenceIndexError, SrlError } from "./src/errors";
export type { SrlErrorCode } from "./src/errors";

export { env, loadEnv, readerOptionsSchema, resolveReaderOptions } from "./src/config";
export type { ReaderEnv, ReaderOptions, ResolvedReaderOptions } from "./src/config";

export { logger } from "./src/logger";

export { listCorpusFiles, parseCommentMetadata, readConllBlocks, splitConllBlocks } from "./src/conll_blocks";
export type { ConllBlock, ConllLine } from "./src/conll_blocks";

export { parseWithDialect, readWithDialect } from "./src/srl_reader";
export type {
  ArgumentDropped,
  ParseContext,
  ParseTextOptions,
  SentenceSkipped,
  SrlCorpus,
  SrlDiagnostic,
  SrlDialect,
} from "./src/srl_reader";

export { conll2012Dialect, conll2012Sense, parseConll2012, parseConll2012Block, readConll2012 } from "./src/conll2012";
export { conll2009Dialect, parseConll2009, parseConll2009Block, readConll2009 } from "./src/conll2009";
export {
  parseUnitedSrl,
  parseUnitedSrlBlock,
  readUnitedSrl,
  unitedRoleSpans,
  unitedSentenceId,
  unitedSrlDialect,
} from "./src/united_srl";

export { SRL_DIALECTS, isSrlFormat, parseSrlText, readSrlCorpus, srlDialect, srlFormats } from "./src/srl_readers";
export type { SrlFormat } from "./src/srl_readers";
