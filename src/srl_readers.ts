import type { ReaderOptions } from "./config";
import { conll2009Dialect } from "./conll2009";
import { conll2012Dialect } from "./conll2012";
import { InvalidRequestError } from "./errors";
import { type ParseTextOptions, type SrlCorpus, type SrlDialect, parseWithDialect, readWithDialect } from "./srl_reader";
import type { SrlSentence } from "./srl_objects";
import { unitedSrlDialect } from "./united_srl";

export const SRL_DIALECTS = {
  conll2009: conll2009Dialect,
  conll2012: conll2012Dialect,
  united: unitedSrlDialect,
} as const satisfies Record<string, SrlDialect>;

export type SrlFormat = keyof typeof SRL_DIALECTS;

export function srlFormats(): SrlFormat[] {
  return Object.keys(SRL_DIALECTS).filter(isSrlFormat);
}

export function isSrlFormat(value: string): value is SrlFormat {
  return Object.prototype.hasOwnProperty.call(SRL_DIALECTS, value);
}

export function srlDialect(format: string): SrlDialect {
  if (!isSrlFormat(format)) {
    throw new InvalidRequestError(`unknown SRL format: ${format}. Available formats are: ${Object.keys(SRL_DIALECTS).join(", ")}`);
  }
  return SRL_DIALECTS[format];
}

export function parseSrlText(text: string, format: string, options?: ParseTextOptions): SrlSentence[] {
  return parseWithDialect(srlDialect(format), text, options);
}

export async function readSrlCorpus(path: string, format: string, options?: ReaderOptions): Promise<SrlCorpus> {
  return readWithDialect(srlDialect(format), path, options);
}
