export type SrlErrorCode = "index_out_of_range" | "not_a_predicate" | "invalid_request" | "corpus_format";

export class SrlError extends Error {
  constructor(
    message: string,
    public readonly code: SrlErrorCode,
  ) {
    super(message);
    this.name = "SrlError";
    Error.captureStackTrace(this, this.constructor);
  }
}

export class SentenceIndexError extends SrlError {
  constructor(
    public readonly index: number,
    public readonly length: number,
  ) {
    super(`index out of range: provided index is ${index}, sentence length is ${length}`, "index_out_of_range");
    this.name = "SentenceIndexError";
  }
}

export class NotAPredicateError extends SrlError {
  constructor(public readonly index: number) {
    super(`index ${index} is not a predicate`, "not_a_predicate");
    this.name = "NotAPredicateError";
  }
}

export class InvalidRequestError extends SrlError {
  constructor(message: string) {
    super(message, "invalid_request");
    this.name = "InvalidRequestError";
  }
}

export class CorpusFormatError extends SrlError {
  constructor(
    public readonly source: string,
    public readonly line: number,
    public readonly reason: string,
  ) {
    super(`${source}:${line}: ${reason}`, "corpus_format");
    this.name = "CorpusFormatError";
  }
}
