type Level = "debug" | "info" | "warn" | "error";

const levelOrder: Record<Level, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const isLevel = (value: string | undefined): value is Level =>
  value !== undefined && value in levelOrder;

const LOG_LEVEL = process.env.LOG_LEVEL?.trim().toLowerCase();
const minLevel = isLevel(LOG_LEVEL) ? levelOrder[LOG_LEVEL] : levelOrder.info;

const nowIso = () => new Date().toISOString();

const shouldLog = (level: Level) => levelOrder[level] >= minLevel;

const AUDIO_KEYS = new Set(["audio", "pcm", "pcm16", "wav"]);

const redactString = (value: string): string =>
  // conservative: redact anything that looks like a bearer token / api key-ish
  value
    .replace(/Bearer\s+[A-Za-z0-9._-]+/g, "Bearer [REDACTED]")
    .replace(/(api[_-]?key\s*[:=]\s*)([^\s"']+)/gi, "$1[REDACTED]")
    .replace(/(token\s*[:=]\s*)([^\s"']+)/gi, "$1[REDACTED]");

const redact = (key: string, value: unknown): unknown => {
  if (typeof value !== "string") return value;
  if (AUDIO_KEYS.has(key)) return "[REDACTED_AUDIO]";
  return redactString(value);
};

const safeJson = (fields: Record<string, unknown>): Record<string, unknown> =>
  JSON.parse(
    JSON.stringify(fields, (k, v: unknown) => {
      if (!k) return v;
      return redact(k, v);
    }),
  );

const baseLog = (level: Level, msg: string, fields?: Record<string, unknown>) => {
  if (!shouldLog(level)) return;
  const payload = {
    t: nowIso(),
    level,
    msg,
    ...(fields ? safeJson(fields) : {}),
  };
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(payload));
};

export const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

export const log = {
  debug: (msg: string, fields?: Record<string, unknown>) => baseLog("debug", msg, fields),
  info: (msg: string, fields?: Record<string, unknown>) => baseLog("info", msg, fields),
  warn: (msg: string, fields?: Record<string, unknown>) => baseLog("warn", msg, fields),
  error: (msg: string, fields?: Record<string, unknown>) => baseLog("error", msg, fields),
};
