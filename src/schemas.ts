import { z } from "zod";
import { UNCERTAIN_LABEL } from "./types.js";
import { log } from "./logger.js";

const nonBlank = z.string().refine((s) => s.trim().length > 0, "blank text");
const source = z.string().min(1).catch("unknown");

export const LabelSchema = z.enum(["GUEST", "HOST", "OTHER", "MAYBE"]);

export const UncertainExampleSchema = z.object({
  text: nonBlank,
  source,
  label: z.literal(UNCERTAIN_LABEL).catch(UNCERTAIN_LABEL),
  timestamp: z.string(),
});

/** Candidate files hold either `{phrase, source}` objects or bare strings. */
export const CandidateSchema = z.union([
  z.object({ phrase: nonBlank.transform((s) => s.trim()), source }),
  nonBlank.transform((s) => ({ phrase: s.trim(), source: "unknown" })),
]);

export const SuggestionSchema = z.object({
  phrase: nonBlank,
  source,
  similarity_score: z.number().finite(),
  suggested_by_engine: z.literal(true),
  timestamp: z.string(),
});

/** Older label files keyed the text as `phrase`. */
export const LabelRecordSchema = z
  .object({
    text: z.string().optional(),
    phrase: z.string().optional(),
    label: LabelSchema,
    source,
  })
  .transform((r, ctx) => {
    const text = (r.text ?? r.phrase ?? "").trim();
    if (text.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "label record has no text" });
      return z.NEVER;
    }
    return { text, label: r.label, source: r.source };
  });

export const ConsumptionMarkSchema = z.object({
  phrase: nonBlank,
  label: LabelSchema,
  consumedAt: z.string(),
});

/**
 * Keep the array elements that match `schema`, dropping the rest with a single
 * warning. A non-array payload counts as empty.
 */
export function parseRecords<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: unknown,
  what: string,
): T[] {
  if (!Array.isArray(raw)) {
    if (raw !== undefined && raw !== null) log.warn(`${what}: expected a JSON array, ignoring contents`);
    return [];
  }
  const out: T[] = [];
  let dropped = 0;
  for (const item of raw) {
    const parsed = schema.safeParse(item);
    if (parsed.success) {
      out.push(parsed.data);
    } else {
      dropped += 1;
    }
  }
  if (dropped > 0) log.warn(`${what}: dropped ${dropped} malformed record(s)`);
  return out;
}

