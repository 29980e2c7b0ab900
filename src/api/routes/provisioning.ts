import { Router } from "express";
import { z } from "zod";
import { lessonPlannerPayloadSchema } from "../../domain/lessonRecord";
import { ProvisioningService, StudentSubjectLinker } from "../../services";
import { parseBody } from "../validation";

const provisionRequestSchema = z.object({
  subject: z.string().trim().min(1),
  body: lessonPlannerPayloadSchema,
});

const linkStudentsRequestSchema = z.object({
  body: z.object({
    lesson_planner_UUID: z.string().min(1),
    student: z.array(z.string().min(1)).min(1),
  }),
});

export function createProvisioningRouter(
  provisioning: ProvisioningService,
  linker: StudentSubjectLinker
): Router {
  const router = Router();

  // POST /process_all - Create a lesson and register it with the school systems
  router.post("/process_all", async (req, res) => {
    const request = parseBody(provisionRequestSchema, req, res);
    if (!request) return;

    try {
      const outcome = await provisioning.provision({ subject: request.subject, lesson: request.body });

      if (!outcome.ok) {
        return res.status(400).json({
          status: "error",
          uuid: outcome.lessonUUID,
          step: outcome.error.step,
          error: outcome.error.message,
        });
      }

      const report = outcome.report;
      res.json({
        status: "success",
        uuid: report.lessonUUID,
        subject_id: report.subjectId,
        message: `Subject ${request.subject} inserted successfully, lesson planner stored.`,
        assigned_students: report.assignedStudents.map((s) => ({ email: s.email, student_id: s.studentId })),
        not_found_students: report.notFoundStudents,
        failed_assignments: report.failedAssignments.map((f) => ({
          email: f.email,
          student_id: f.studentId,
          resp: f.response,
        })),
        step_errors: report.stepErrors,
      });
    } catch (error) {
      console.error("Error provisioning lesson:", error);
      res.status(500).json({ status: "error", error: "Failed to provision lesson" });
    }
  });

  // POST /update_student_subjects - Link a lesson to students' subject lists
  router.post("/update_student_subjects", async (req, res) => {
    const request = parseBody(linkStudentsRequestSchema, req, res);
    if (!request) return;

    try {
      const summary = await linker.linkMany(request.body.lesson_planner_UUID, request.body.student);
      res.json({
        status: "success",
        lesson_planner_UUID: summary.lessonUUID,
        updated_students: summary.updated,
        already_linked: summary.alreadyLinked,
        not_found: summary.notFound,
        failed: summary.failed,
      });
    } catch (error) {
      console.error("Error updating student subjects:", error);
      res.status(500).json({ status: "error", error: "Failed to update student subjects" });
    }
  });

  return router;
}
