import { z } from "zod";
import { InvalidRequestError } from "./errors";

const envSchema = z.object({
  // Only "test" is interpreted (silences the logger).
  NODE_ENV: z.string().default("development"),
  SRL_LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("warn"),
});

export type ReaderEnv = z.infer<typeof envSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("\n");
}

export function loadEnv(source: Record<string, string | undefined> = process.env): ReaderEnv {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) throw new Error(`Environment validation failed:\n${formatIssues(parsed.error)}`);
  return parsed.data;
}

export const env = loadEnv();

export const readerOptionsSchema = z
  .object({
    onMalformed: z.enum(["throw", "skip"]).default("throw"),
    concurrency: z.number().int().positive().default(1),
    fileSuffix: z.string().min(1).optional(),
    source: z.string().min(1).default("<text>"),
  })
  .strict();

export type ReaderOptions = z.input<typeof readerOptionsSchema>;
export type ResolvedReaderOptions = z.output<typeof readerOptionsSchema>;

export function resolveReaderOptions(options: ReaderOptions = {}): ResolvedReaderOptions {
  const parsed = readerOptionsSchema.safeParse(options);
  if (!parsed.success) throw new InvalidRequestError(`invalid reader options:\n${formatIssues(parsed.error)}`);
  return parsed.data;
}
