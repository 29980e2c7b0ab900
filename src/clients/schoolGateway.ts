import { GatewayError } from "./errors";
import { FetchFn, HttpResult, idField, isRecord, postJson, truncate } from "./http";

/**
 * School gateway: API Gateway endpoints in front of the school database.
 *
 * Every call is a JSON POST authenticated with `x-api-key`. Successful
 * responses may have an empty or non-JSON body.
 */
export interface SchoolGateway {
  resolveSchoolId(tenantEmail: string): Promise<string | null>;
  insertSubject(input: InsertSubjectInput): Promise<string | null>;
  insertSubjectTeacher(subjectId: string, teacherId: string): Promise<void>;
  insertLessonPlanner(payload: Record<string, unknown>): Promise<void>;
  getStudentIdByEmail(email: string): Promise<string | null>;
  assignSubjectToStudent(studentId: string, subjectId: string): Promise<unknown>;
}

export interface InsertSubjectInput {
  name: string;
  grade: string;
  section: string;
  period: string;
  schoolId: string;
}

export interface SchoolGatewayOptions {
  baseUrl: string;
  apiKey: string;
  studentLookupSchoolId: number;
  fetchFn?: FetchFn;
}

type QueryName =
  | "get_school_by_email"
  | "insert_subject"
  | "insert_subject_teacher"
  | "get_student_by_email"
  | "assign_subject_to_student";

export class HttpSchoolGateway implements SchoolGateway {
  private baseUrl: string;
  private apiKey: string;
  private studentLookupSchoolId: number;
  private fetchFn: FetchFn;

  constructor(options: SchoolGatewayOptions) {
    this.baseUrl = options.baseUrl;
    this.apiKey = options.apiKey;
    this.studentLookupSchoolId = options.studentLookupSchoolId;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async resolveSchoolId(tenantEmail: string): Promise<string | null> {
    const result = await this.query("get_school_by_email", { email: tenantEmail });
    return firstRowId(result, "school_id");
  }

  async insertSubject(input: InsertSubjectInput): Promise<string | null> {
    const result = await this.query("insert_subject", {
      name: input.name,
      grade: input.grade,
      section: input.section,
      school_id: input.schoolId,
      period: input.period,
    });
    this.ensureOk(result, "insert_subject");
    return idField(result.json, "inserted_subject_id");
  }

  async insertSubjectTeacher(subjectId: string, teacherId: string): Promise<void> {
    const result = await this.query("insert_subject_teacher", {
      subject_id: subjectId,
      teacher_id: teacherId,
      role_id: "",
      school_year: "",
      school_year_id: "",
    });
    this.ensureOk(result, "insert_subject_teacher");
  }

  async insertLessonPlanner(payload: Record<string, unknown>): Promise<void> {
    const url = `${this.baseUrl}/insert?query_name=insert_lesson_planner_payload`;
    const result = await postJson(this.fetchFn, url, { lesson_planner: payload }, this.headers());
    console.log(`[gateway] insert_lesson_planner_payload status=${result.status}`);
    this.ensureOk(result, "insert_lesson_planner_payload");

    // The gateway sometimes answers 200 with an error body
    if (isRecord(result.json) && result.json.error) {
      throw new GatewayError(`insert_lesson_planner_payload failed: ${truncate(result.text)}`, {
        statusCode: result.status,
        body: result.text,
      });
    }
  }

  async getStudentIdByEmail(email: string): Promise<string | null> {
    const result = await this.query("get_student_by_email", {
      email,
      school_id: this.studentLookupSchoolId,
    });
    if (!result.ok) {
      return null;
    }
    return firstRowId(result, "student_id");
  }

  async assignSubjectToStudent(studentId: string, subjectId: string): Promise<unknown> {
    const result = await this.query("assign_subject_to_student", {
      student_id: studentId,
      subject_id: subjectId,
      assigned_level_id: "",
      is_homeroom: "False",
      school_year_id: "",
    });
    if (result.json !== null) {
      return result.json;
    }
    return result.text.trim() ? result.text : {};
  }

  private headers(): Record<string, string> {
    return { "x-api-key": this.apiKey };
  }

  private async query(name: QueryName, body: Record<string, unknown>): Promise<HttpResult> {
    const url = `${this.baseUrl}/query?query_name=${name}`;
    const result = await postJson(this.fetchFn, url, body, this.headers());
    console.log(`[gateway] ${name} status=${result.status} response=${truncate(result.text, 200)}`);
    return result;
  }

  private ensureOk(result: HttpResult, name: string): void {
    if (!result.ok) {
      throw new GatewayError(`${name} failed (HTTP ${result.status}): ${truncate(result.text)}`, {
        statusCode: result.status,
        body: result.text,
      });
    }
  }
}

function firstRowId(result: HttpResult, field: string): string | null {
  if (!Array.isArray(result.json) || result.json.length === 0) {
    return null;
  }
  return idField(result.json[0], field);
}
