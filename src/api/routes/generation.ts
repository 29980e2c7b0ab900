import { Router } from "express";
import { coursePlanRequestSchema } from "../../domain/coursePlan";
import { NotFoundError } from "../../domain/errors";
import { JobScope, testSeriesRequestSchema } from "../../domain/generationJob";
import { CoursePlanService, TestSeriesService } from "../../services";
import { parseBody } from "../validation";

export function createGenerationRouter(
  testSeries: TestSeriesService,
  coursePlans: CoursePlanService
): Router {
  const router = Router();

  // POST /generate_itp - Start a test series and wait for it to finish
  router.post("/generate_itp", async (req, res) => {
    const request = parseBody(testSeriesRequestSchema, req, res);
    if (!request) return;

    // Stop polling when the client goes away; the job keeps running upstream
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });

    try {
      const result = await testSeries.dispatchAndPoll(request, { signal: controller.signal });

      switch (result.kind) {
        case "already_generated":
          return res.status(400).json({ body: result.body, statusCode: 400 });
        case "done":
          return res.json({
            status: "success",
            message: "ITP generated successfully",
            data: { id: result.jobId, series_title: result.seriesTitle },
          });
        case "timeout":
          return res.status(202).json({
            status: "timeout",
            message: "ITP generation still in progress",
            id: result.jobId,
          });
        case "unexpected":
          if (result.statusCode === 200) {
            return res.json({ body: result.raw, statusCode: 200 });
          }
          return res.status(400).json({
            status: "error",
            message: "Unexpected initialize response",
            response: { statusCode: result.statusCode, body: result.raw },
          });
        case "error":
          return res.status(502).json({ status: "error", id: result.jobId, error: result.detail });
      }
    } catch (error) {
      console.error("Error generating ITP:", error);
      res.status(500).json({ status: "error", error: "Failed to generate ITP" });
    }
  });

  // GET /itp_status/:id - Read a test series job once (?email= for user jobs)
  router.get("/itp_status/:id", async (req, res) => {
    const email = typeof req.query.email === "string" ? req.query.email.trim() : "";
    const scope: JobScope = email ? { predefined: false, userEmail: email } : { predefined: true };

    try {
      const status = await testSeries.checkStatus(req.params.id, scope);
      switch (status.state) {
        case "generated":
        case "generating":
          return res.json({
            status: status.state,
            id: status.id,
            isGenerated: status.state === "generated",
            series_title: status.seriesTitle,
          });
        case "malformed":
          return res.status(400).json({ status: "error", id: status.id, isGenerated: "error" });
        case "not_found":
          return res.status(404).json({ status: "error", id: status.id, message: "ITP not found" });
      }
    } catch (error) {
      console.error("Error checking ITP status:", error);
      res.status(500).json({ status: "error", error: "Failed to check ITP status" });
    }
  });

  // POST /generate_icp - Generate a course plan unless one already exists
  router.post("/generate_icp", async (req, res) => {
    const request = parseBody(coursePlanRequestSchema, req, res);
    if (!request) return;

    try {
      if (request.predefined) {
        const result = await coursePlans.generatePredefined(request);
        switch (result.kind) {
          case "invoked":
            return res.status(result.statusCode).json({ status: result.body });
          case "invoke_error":
            return res.status(502).json({ status: "error", error: result.detail });
          case "upstream_error":
            return res.status(502).json({
              status: "error",
              message: "Course generator failed",
              upstream_status: result.statusCode,
              error: result.detail,
            });
          case "malformed_upstream":
            return res.status(502).json({ status: "error", message: "Course generator returned no course" });
        }
      }

      const result = await coursePlans.generateOrFetch(request);
      switch (result.kind) {
        case "already_exists":
          return res.json({ status: "already_exists", topic_id: result.topicId });
        case "stored":
          return res.json({ status: "stored", topic_id: result.topicId });
        case "upstream_error":
          return res.status(502).json({
            status: "error",
            message: "Course generator failed",
            upstream_status: result.statusCode,
            error: result.detail,
          });
        case "malformed_upstream":
          return res.status(502).json({ status: "error", message: "Course generator returned no course" });
        case "store_error":
          return res.status(500).json({ status: "error", error: result.detail });
      }
    } catch (error) {
      if (error instanceof NotFoundError) {
        return res.status(404).json({ status: "error", error: error.message });
      }
      console.error("Error generating ICP:", error);
      res.status(500).json({ status: "error", error: "Failed to generate ICP" });
    }
  });

  return router;
}
