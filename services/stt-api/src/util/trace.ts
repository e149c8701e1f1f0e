import { randomUUID } from "node:crypto";

export type RequestTrace = {
  traceId: string;
  startedAt: number;
  marks: Record<string, number>;
};

/** Reuses an incoming `x-request-id` when the caller sent one. */
export const createTrace = (requestId?: string): RequestTrace => {
  const id = requestId && requestId.trim() ? requestId.trim().slice(0, 128) : randomUUID();
  return { traceId: id, startedAt: Date.now(), marks: {} };
};

export const mark = (trace: RequestTrace, stage: string) => {
  trace.marks[stage] = Date.now() - trace.startedAt;
};

export const msSinceStart = (trace: RequestTrace) => Date.now() - trace.startedAt;
