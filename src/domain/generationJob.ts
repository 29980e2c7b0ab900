import { z } from "zod";

/**
 * Test series ("ITP") generation jobs.
 *
 * A job is created by the external generator. This service only reads it
 * back, either from the predefined job table (keyed by id) or from the
 * user job table (keyed by owner email and id).
 */

export type JobScope =
  | { predefined: true }
  | { predefined: false; userEmail: string };

export interface GenerationJobRecord {
  id: string;
  Generated?: unknown;
  series_title?: string;
  email?: string;
}

export type JobStatus =
  | { state: "generated"; id: string; seriesTitle: string | null }
  | { state: "generating"; id: string; seriesTitle: string | null }
  | { state: "malformed"; id: string }
  | { state: "not_found"; id: string };

/**
 * Classify a job record. Only an explicit `false` means the job is still
 * generating; a missing or non-boolean flag is a malformed record.
 */
export function interpretJobRecord(id: string, record: GenerationJobRecord | null): JobStatus {
  if (!record) {
    return { state: "not_found", id };
  }
  const seriesTitle = typeof record.series_title === "string" ? record.series_title : null;
  if (record.Generated === true) {
    return { state: "generated", id, seriesTitle };
  }
  if (record.Generated === false) {
    return { state: "generating", id, seriesTitle };
  }
  return { state: "malformed", id };
}

/**
 * Initializer response envelope. `body` shape depends on `statusCode`.
 */
export const initializeEnvelopeSchema = z.object({
  statusCode: z.number().int(),
  body: z.unknown(),
});

export type InitializeEnvelope = z.infer<typeof initializeEnvelopeSchema>;

/**
 * What the initializer answered when the reply was not an envelope:
 * the HTTP status and the parsed body, or the raw text when it is not JSON.
 */
export interface UnrecognizedReply {
  unrecognized: true;
  httpStatus: number;
  raw: unknown;
}

export type InitializeReply = InitializeEnvelope | UnrecognizedReply;

export const generatingBodySchema = z.object({
  generating: z.literal(true),
  id: z.union([z.string().min(1), z.number()]).transform(String),
});

export type DispatchResult =
  | { kind: "already_generated"; body: unknown }
  | { kind: "done"; jobId: string; seriesTitle: string | null }
  | { kind: "timeout"; jobId: string }
  | { kind: "unexpected"; statusCode: number; raw: unknown }
  | { kind: "error"; jobId: string | null; detail: string };

/**
 * Inbound test series request. Forwarded as-is to the initializer;
 * `predefined` and `user_id` pick the table polled afterwards.
 */
export const testSeriesRequestSchema = z
  .object({
    user_id: z.string().min(1).optional(),
    predefined: z.boolean().default(true),
  })
  .passthrough()
  .refine((request) => request.predefined || request.user_id !== undefined, {
    message: "user_id is required when predefined is false",
    path: ["user_id"],
  });

export type TestSeriesRequest = z.infer<typeof testSeriesRequestSchema>;

export function jobScopeFor(request: TestSeriesRequest): JobScope {
  if (!request.predefined && request.user_id) {
    return { predefined: false, userEmail: request.user_id };
  }
  return { predefined: true };
}
