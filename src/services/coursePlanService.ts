/**
 * Course Plan Service
 *
 * Generates a course plan once per (owner email, topic). The stored ICP
 * record is the dedup marker: when it exists the generator is never
 * called again.
 *
 * Predefined course plans skip the dedup check and are handed to the
 * module builder function instead of being stored here.
 */

import { CourseGenerator } from "../clients/generators";
import { InvocationResult, ModuleInvoker } from "../clients/moduleInvoker";
import {
  CoursePlanOutcome,
  CoursePlanRequest,
  PredefinedCoursePlanOutcome,
  toGenerationInput,
} from "../domain/coursePlan";
import { NotFoundError, errorMessage } from "../domain/errors";
import { CoursePlanStore } from "../stores/coursePlanStore";
import { LessonRecordStore } from "../stores/lessonRecordStore";

export interface CoursePlanServiceDeps {
  generator: CourseGenerator;
  coursePlanStore: CoursePlanStore;
  lessonRecordStore: LessonRecordStore;
  moduleInvoker: ModuleInvoker;
  environment: string;
  now?: () => Date;
}

type GenerationFailure = Extract<CoursePlanOutcome, { kind: "upstream_error" | "malformed_upstream" }>;

type GenerationAttempt = { ok: true; course: unknown } | { ok: false; outcome: GenerationFailure };

export class CoursePlanService {
  private generator: CourseGenerator;
  private coursePlanStore: CoursePlanStore;
  private lessonRecordStore: LessonRecordStore;
  private moduleInvoker: ModuleInvoker;
  private environment: string;
  private now: () => Date;

  constructor(deps: CoursePlanServiceDeps) {
    this.generator = deps.generator;
    this.coursePlanStore = deps.coursePlanStore;
    this.lessonRecordStore = deps.lessonRecordStore;
    this.moduleInvoker = deps.moduleInvoker;
    this.environment = deps.environment;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * @throws NotFoundError when no owner email is given and the subject
   * record does not exist
   */
  async generateOrFetch(request: CoursePlanRequest): Promise<CoursePlanOutcome> {
    const topicId = request.topic_id;

    let ownerEmail: string;
    try {
      ownerEmail = await this.resolveOwner(request);
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw error;
      }
      console.error("[icp] Owner lookup failed:", errorMessage(error));
      return { kind: "store_error", detail: errorMessage(error) };
    }

    try {
      if (await this.coursePlanStore.exists(ownerEmail, topicId)) {
        console.log(`[icp] Course plan for ${ownerEmail}/${topicId} already exists`);
        return { kind: "already_exists", topicId };
      }
    } catch (error) {
      console.error("[icp] Dedup lookup failed:", errorMessage(error));
      return { kind: "store_error", detail: errorMessage(error) };
    }

    const attempt = await this.generate(request);
    if (!attempt.ok) {
      return attempt.outcome;
    }

    try {
      await this.coursePlanStore.save({
        email: ownerEmail.toLowerCase(),
        topic_id: topicId,
        subject_id: request.subject_id,
        course: attempt.course,
        env: this.environment,
        created_at: this.now().toISOString(),
      });
    } catch (error) {
      // Generated but not recorded: a retry will generate again
      console.error("[icp] Storing course plan failed:", errorMessage(error));
      return { kind: "store_error", detail: errorMessage(error) };
    }
    console.log(`[icp] Stored course plan ${ownerEmail.toLowerCase()}/${topicId}`);
    return { kind: "stored", topicId };
  }

  /**
   * Generate without dedup and forward the course to the module builder.
   * The invocation's own status and body are the result.
   */
  async generatePredefined(request: CoursePlanRequest): Promise<PredefinedCoursePlanOutcome> {
    const attempt = await this.generate(request);
    if (!attempt.ok) {
      return attempt.outcome;
    }

    let invocation: InvocationResult;
    try {
      invocation = await this.moduleInvoker.invoke({
        user_id: request.tenantEmail,
        body: {
          module: "ICP",
          body: attempt.course,
          env: this.environment,
          subject_id: request.subject_id,
          topic_id: request.topic_id,
        },
      });
    } catch (error) {
      console.error("[icp] Module builder invocation failed:", errorMessage(error));
      return { kind: "invoke_error", detail: errorMessage(error) };
    }
    console.log(`[icp] Module builder answered ${invocation.statusCode}`);
    return { kind: "invoked", statusCode: invocation.statusCode, body: invocation.body };
  }

  private async resolveOwner(request: CoursePlanRequest): Promise<string> {
    if (request.tenantEmail) {
      return request.tenantEmail;
    }
    const owner = await this.lessonRecordStore.getTenantEmail(request.subject_id);
    if (!owner) {
      throw new NotFoundError("Subject", request.subject_id);
    }
    return owner;
  }

  private async generate(request: CoursePlanRequest): Promise<GenerationAttempt> {
    try {
      const response = await this.generator.generate(toGenerationInput(request));
      if (!response.ok) {
        return {
          ok: false,
          outcome: { kind: "upstream_error", statusCode: response.statusCode, detail: response.body },
        };
      }
      if (response.course === undefined || response.course === null) {
        return { ok: false, outcome: { kind: "malformed_upstream", statusCode: response.statusCode } };
      }
      return { ok: true, course: response.course };
    } catch (error) {
      console.error("[icp] Generator call failed:", errorMessage(error));
      return { ok: false, outcome: { kind: "upstream_error", statusCode: null, detail: errorMessage(error) } };
    }
  }
}
