import { DEFAULT_BEAM_SIZE, DEFAULT_MODEL, InvalidParameterError, MAX_BEAM_SIZE, MIN_BEAM_SIZE } from "@local-stt/engine";
import { z } from "zod";

export const DEFAULT_MAX_UPLOAD_MB = 50;
export const MAX_UPLOAD_MB_LIMIT = 500;

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

const queryBoolean = z.string().transform((raw, ctx) => {
  const value = raw.trim().toLowerCase();
  if (TRUE_VALUES.has(value)) return true;
  if (FALSE_VALUES.has(value)) return false;
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${raw}"` });
  return z.NEVER;
});

const transcribeQuerySchema = z.object({
  model: z.string().default(DEFAULT_MODEL),
  language: z.string().optional(),
  beamSize: z.coerce.number().int().min(MIN_BEAM_SIZE).max(MAX_BEAM_SIZE).default(DEFAULT_BEAM_SIZE),
  voiceActivityFilter: queryBoolean.default("true"),
  maxUploadMB: z.coerce.number().int().min(1).max(MAX_UPLOAD_MB_LIMIT).default(DEFAULT_MAX_UPLOAD_MB),
});

export type TranscribeQuery = z.infer<typeof transcribeQuerySchema>;

// snake_case names are what the first version of the API took
const ALIASES: Record<string, keyof TranscribeQuery> = {
  beam_size: "beamSize",
  vad_filter: "voiceActivityFilter",
  max_upload_mb: "maxUploadMB",
};

const firstString = (value: unknown): string | undefined => {
  if (typeof value === "string") return value;
  if (Array.isArray(value)) return firstString(value[0]);
  return undefined;
};

export const parseTranscribeQuery = (query: Record<string, unknown>): TranscribeQuery => {
  const flat: Record<string, string> = {};
  for (const [key, raw] of Object.entries(query)) {
    const value = firstString(raw);
    if (value === undefined) continue;
    const target = ALIASES[key] ?? key;
    if (!(target in flat)) flat[target] = value;
  }

  const parsed = transcribeQuerySchema.safeParse(flat);
  if (!parsed.success) {
    const issues = parsed.error.issues;
    const parameter = String(issues[0]?.path[0] ?? "query");
    throw new InvalidParameterError(
      parameter,
      issues.map((issue) => `${issue.path.join(".") || "query"}: ${issue.message}`).join("; "),
    );
  }
  return parsed.data;
};
