/**
 * Provisioning Service
 *
 * Creates a lesson and wires it into the school systems:
 *
 * 1. createLessonRecord   - Grade_and_Subject item (fatal on failure)
 * 2. registerSubject      - resolve school by tenant email, insert subject
 * 3. assignStudents       - look up each student, assign the new subject
 * 4. registerTeacher      - subject/teacher relation
 * 5. persistLessonPlanner - full payload to the lesson planner gateway
 *
 * Steps 2-5 are forward-only: a failure is recorded in the report and the
 * saga moves on. Nothing is rolled back.
 */

import { isRecord } from "../clients/http";
import { SchoolGateway } from "../clients/schoolGateway";
import { errorMessage } from "../domain/errors";
import { LessonPlannerPayload, Tenant, buildLessonRecord } from "../domain/lessonRecord";
import {
  ProvisionOutcome,
  ProvisionReport,
  ProvisionStep,
  StepError,
} from "../domain/provisioning";
import { LessonRecordStore } from "../stores/lessonRecordStore";

export interface ProvisionInput {
  subject: string;
  lesson: LessonPlannerPayload;
}

export interface ProvisioningServiceDeps {
  lessonRecordStore: LessonRecordStore;
  gateway: SchoolGateway;
  tenant: Tenant;
  now?: () => Date;
}

export class ProvisioningService {
  private lessonRecordStore: LessonRecordStore;
  private gateway: SchoolGateway;
  private tenant: Tenant;
  private now: () => Date;

  constructor(deps: ProvisioningServiceDeps) {
    this.lessonRecordStore = deps.lessonRecordStore;
    this.gateway = deps.gateway;
    this.tenant = deps.tenant;
    this.now = deps.now ?? (() => new Date());
  }

  async provision(input: ProvisionInput): Promise<ProvisionOutcome> {
    const subject = input.subject.trim();
    const lesson = input.lesson;
    const lessonUUID = lesson.lesson_planner_UUID;

    console.log(`[provision] Start ${lessonUUID} (${subject})`);

    try {
      await this.lessonRecordStore.save(buildLessonRecord(subject, lesson, this.tenant, this.now()));
      console.log("[provision] Step 1: lesson record created");
    } catch (error) {
      console.error("[provision] Step 1 failed:", error);
      return {
        ok: false,
        lessonUUID,
        error: { step: "createLessonRecord", message: errorMessage(error) },
      };
    }

    const report: ProvisionReport = {
      lessonUUID,
      subjectId: null,
      assignedStudents: [],
      notFoundStudents: [],
      failedAssignments: [],
      stepErrors: [],
    };

    const subjectId = await this.registerSubject(subject, lesson, report.stepErrors);
    report.subjectId = subjectId;

    if (subjectId && lesson.student.length > 0) {
      await this.assignStudents(subjectId, lesson.student, report);
    } else {
      console.log("[provision] Step 3: skipped (no subject id or no students)");
    }

    const teacherId = String(lesson.teacher_id ?? "");
    if (subjectId && teacherId) {
      await this.runStep("registerTeacher", report.stepErrors, () =>
        this.gateway.insertSubjectTeacher(subjectId, teacherId)
      );
    } else {
      console.log("[provision] Step 4: skipped (no subject id or teacher id)");
    }

    await this.runStep("persistLessonPlanner", report.stepErrors, () =>
      this.gateway.insertLessonPlanner(lesson)
    );

    console.log(
      `[provision] Done ${lessonUUID}: ${report.assignedStudents.length} assigned, ` +
        `${report.notFoundStudents.length} not found, ${report.failedAssignments.length} failed, ` +
        `${report.stepErrors.length} step errors`
    );
    return { ok: true, report };
  }

  private async registerSubject(
    subject: string,
    lesson: LessonPlannerPayload,
    stepErrors: StepError[]
  ): Promise<string | null> {
    try {
      const schoolId = await this.gateway.resolveSchoolId(this.tenant.email);
      if (!schoolId) {
        stepErrors.push({
          step: "registerSubject",
          message: `No school registered for ${this.tenant.email}`,
        });
        console.log("[provision] Step 2: no school id resolved");
        return null;
      }

      const subjectId = await this.gateway.insertSubject({
        name: subject,
        grade: lesson.grade,
        section: lesson.section,
        period: lesson.period,
        schoolId,
      });
      if (!subjectId) {
        stepErrors.push({ step: "registerSubject", message: "Gateway returned no inserted_subject_id" });
        console.log("[provision] Step 2: subject id missing from response");
        return null;
      }

      console.log(`[provision] Step 2: subject registered, subject_id=${subjectId}`);
      return subjectId;
    } catch (error) {
      stepErrors.push({ step: "registerSubject", message: errorMessage(error) });
      console.error("[provision] Step 2 failed:", errorMessage(error));
      return null;
    }
  }

  private async assignStudents(
    subjectId: string,
    emails: string[],
    report: ProvisionReport
  ): Promise<void> {
    for (const email of emails) {
      let studentId: string | null;
      try {
        studentId = await this.gateway.getStudentIdByEmail(email);
      } catch (error) {
        // Filed as not found; the step error tells it apart from a missing student
        report.stepErrors.push({
          step: "assignStudents",
          message: `Student lookup failed for ${email}: ${errorMessage(error)}`,
        });
        console.error(`[provision] Step 3: lookup failed for ${email}:`, errorMessage(error));
        studentId = null;
      }

      if (!studentId) {
        report.notFoundStudents.push(email);
        console.log(`[provision] Step 3: no student id for ${email}`);
        continue;
      }

      try {
        const response = await this.gateway.assignSubjectToStudent(studentId, subjectId);
        if (isRecord(response) && response.status === "assigned") {
          report.assignedStudents.push({ email, studentId });
          console.log(`[provision] Step 3: assigned ${subjectId} to ${email} (id=${studentId})`);
        } else {
          report.failedAssignments.push({ email, studentId, response });
          console.log(`[provision] Step 3: assignment not confirmed for ${email}`);
        }
      } catch (error) {
        report.failedAssignments.push({ email, studentId, response: errorMessage(error) });
        console.error(`[provision] Step 3: assignment failed for ${email}:`, errorMessage(error));
      }
    }
  }

  private async runStep(
    step: ProvisionStep,
    stepErrors: StepError[],
    action: () => Promise<void>
  ): Promise<void> {
    try {
      await action();
      console.log(`[provision] ${step}: ok`);
    } catch (error) {
      stepErrors.push({ step, message: errorMessage(error) });
      console.error(`[provision] ${step} failed:`, errorMessage(error));
    }
  }
}
