import { z } from "zod";

/**
 * Course plan ("ICP") generation.
 *
 * A course plan is generated at most once per (owner email, topic id).
 * The stored record is the dedup marker.
 */

export const coursePlanRequestSchema = z.object({
  subject_id: z.union([z.string().min(1), z.number()]).transform(String),
  topic_id: z.union([z.string().min(1), z.number()]).transform(String),
  tenantEmail: z.string().min(1).optional(),
  predefined: z.boolean().default(false),
  topic: z.string().min(1),
  audience: z.string().min(1),
  icp_UUID: z.string().min(1),
  description: z.string().default(""),
});

export type CoursePlanRequest = z.infer<typeof coursePlanRequestSchema>;

/**
 * Body sent to the course generator.
 */
export interface CourseGenerationInput {
  topic: string;
  audience: string;
  icp_UUID: string;
  description: string;
}

export function toGenerationInput(request: CoursePlanRequest): CourseGenerationInput {
  return {
    topic: request.topic,
    audience: request.audience,
    icp_UUID: request.icp_UUID,
    description: request.description,
  };
}

export interface CoursePlanRecord {
  email: string;
  topic_id: string;
  subject_id: string;
  course: unknown;
  env: string;
  created_at: string;
}

export type CoursePlanOutcome =
  | { kind: "already_exists"; topicId: string }
  | { kind: "stored"; topicId: string }
  | { kind: "upstream_error"; statusCode: number | null; detail: string }
  | { kind: "malformed_upstream"; statusCode: number }
  | { kind: "store_error"; detail: string };

/**
 * Result of handing a predefined course plan to the module builder function.
 */
export type PredefinedCoursePlanOutcome =
  | { kind: "invoked"; statusCode: number; body: unknown }
  | { kind: "invoke_error"; detail: string }
  | { kind: "upstream_error"; statusCode: number | null; detail: string }
  | { kind: "malformed_upstream"; statusCode: number };

export function dedupKey(ownerEmail: string, topicId: string): { email: string; topic_id: string } {
  return { email: ownerEmail.toLowerCase(), topic_id: topicId };
}
