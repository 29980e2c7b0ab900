import { CourseGenerationInput } from "../domain/coursePlan";
import { InitializeReply, initializeEnvelopeSchema } from "../domain/generationJob";
import { FetchFn, isRecord, postJson, truncate } from "./http";

/**
 * Test series initializer. Answers with a `{ statusCode, body }` envelope
 * whatever the HTTP status of the call itself; anything else comes back
 * as an unrecognized reply. Only transport failures throw.
 */
export interface TestSeriesGenerator {
  initialize(request: Record<string, unknown>): Promise<InitializeReply>;
}

// `course` is undefined when a 2xx response lacks the payload field
export type CourseGenerationResponse =
  | { ok: true; statusCode: number; course: unknown }
  | { ok: false; statusCode: number; body: string };

/**
 * Course plan generator.
 */
export interface CourseGenerator {
  generate(input: CourseGenerationInput): Promise<CourseGenerationResponse>;
}

export class HttpTestSeriesGenerator implements TestSeriesGenerator {
  constructor(private url: string, private fetchFn: FetchFn = fetch) {}

  async initialize(request: Record<string, unknown>): Promise<InitializeReply> {
    const result = await postJson(this.fetchFn, this.url, request);
    console.log(`[itp] initialize status=${result.status} response=${truncate(result.text)}`);

    const parsed = initializeEnvelopeSchema.safeParse(result.json);
    if (!parsed.success) {
      return {
        unrecognized: true,
        httpStatus: result.status,
        raw: result.json ?? result.text,
      };
    }
    return parsed.data;
  }
}

export class HttpCourseGenerator implements CourseGenerator {
  constructor(private url: string, private fetchFn: FetchFn = fetch) {}

  async generate(input: CourseGenerationInput): Promise<CourseGenerationResponse> {
    const result = await postJson(this.fetchFn, this.url, input);
    console.log(`[icp] generate status=${result.status} response=${truncate(result.text)}`);

    if (!result.ok) {
      return { ok: false, statusCode: result.status, body: result.text };
    }
    const course = isRecord(result.json) ? result.json.course : undefined;
    return { ok: true, statusCode: result.status, course };
  }
}
