import { z } from "zod";

/**
 * Lesson planner payload as submitted by the authoring client.
 *
 * Only the fields the orchestration reads are typed; everything else is
 * passed through untouched to the lesson planner gateway.
 */
// Authoring clients send grade, section and period as strings or numbers
const textField = z.union([z.string(), z.number()]).transform(String).default("");

export const lessonPlannerPayloadSchema = z
  .object({
    lesson_planner_UUID: z.string().min(1),
    grade: textField,
    section: textField,
    period: textField,
    teacher_id: z.union([z.string(), z.number()]).nullish(),
    student: z.array(z.string().min(1)).default([]),
  })
  .passthrough();

export type LessonPlannerPayload = z.infer<typeof lessonPlannerPayloadSchema>;

/**
 * Tenant the lesson is provisioned under.
 */
export interface Tenant {
  email: string;
  name: string;
  iconUrl: string;
}

/**
 * LessonRecord as stored in the Grade_and_Subject table.
 *
 * Attribute names match the table. Written once when a lesson is
 * provisioned; never updated afterwards.
 */
export interface LessonRecord {
  id: string;
  Created_at: string;
  Grade: string;
  Grade_and_Subject: string;
  Grade_and_Subject_UI: string;
  status: "Active";
  Subject: string;
  tenantEmail: string;
  tenantName: string;
  quiz_credit: number;
  course_credit: number;
  icon: string;
  Period: string;
  Section: string;
}

const pad = (value: number) => String(value).padStart(2, "0");

/**
 * Format a date as UTC "YYYY-MM-DD,HH:MM:SS".
 */
export function formatCreatedAt(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())},` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}

export function buildLessonRecord(
  subject: string,
  payload: LessonPlannerPayload,
  tenant: Tenant,
  now: Date = new Date()
): LessonRecord {
  return {
    id: payload.lesson_planner_UUID,
    Created_at: formatCreatedAt(now),
    Grade: payload.grade,
    Grade_and_Subject: `TD: ${subject}`,
    Grade_and_Subject_UI: `${subject} - Assignment`,
    status: "Active",
    Subject: subject,
    tenantEmail: tenant.email,
    tenantName: tenant.name,
    quiz_credit: 0,
    course_credit: 0,
    icon: tenant.iconUrl,
    Period: payload.period,
    Section: payload.section,
  };
}
