/**
 * Provisioning saga results.
 *
 * Steps run in order: createLessonRecord, registerSubject, assignStudents,
 * registerTeacher, persistLessonPlanner. Only createLessonRecord is fatal;
 * every later failure is recorded as a StepError and the saga continues.
 */

export type ProvisionStep =
  | "createLessonRecord"
  | "registerSubject"
  | "assignStudents"
  | "registerTeacher"
  | "persistLessonPlanner";

export interface StepError {
  step: ProvisionStep;
  message: string;
}

export interface AssignedStudent {
  email: string;
  studentId: string;
}

export interface FailedAssignment {
  email: string;
  studentId: string;
  // Raw gateway response, or the error message when the call threw
  response: unknown;
}

export interface ProvisionReport {
  lessonUUID: string;
  subjectId: string | null;
  assignedStudents: AssignedStudent[];
  notFoundStudents: string[];
  failedAssignments: FailedAssignment[];
  stepErrors: StepError[];
}

export type ProvisionOutcome =
  | { ok: true; report: ProvisionReport }
  | { ok: false; lessonUUID: string; error: StepError };

/**
 * Result of linking a lesson to many students' subject lists.
 */
export interface StudentLinkSummary {
  lessonUUID: string;
  updated: string[];
  alreadyLinked: string[];
  notFound: string[];
  failed: string[];
}
