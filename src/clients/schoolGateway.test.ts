import { GatewayError } from "./errors";
import { FetchFn } from "./http";
import { HttpSchoolGateway } from "./schoolGateway";

describe("HttpSchoolGateway", () => {
  let fetchFn: jest.Mock<ReturnType<FetchFn>, Parameters<FetchFn>>;
  let gateway: HttpSchoolGateway;

  const respond = (body: string, status = 200) => new Response(body, { status });

  const sentBody = (call: number): unknown => {
    const init = fetchFn.mock.calls[call][1];
    return JSON.parse(String(init?.body));
  };

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    fetchFn = jest.fn<ReturnType<FetchFn>, Parameters<FetchFn>>();
    gateway = new HttpSchoolGateway({
      baseUrl: "https://gateway.example.com/prod",
      apiKey: "test-key",
      studentLookupSchoolId: 3,
      fetchFn,
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("resolveSchoolId", () => {
    it("posts the tenant email with the API key", async () => {
      fetchFn.mockResolvedValue(respond(JSON.stringify([{ school_id: 12 }])));

      const schoolId = await gateway.resolveSchoolId("school@example.com");

      expect(schoolId).toBe("12");
      expect(fetchFn.mock.calls[0][0]).toBe(
        "https://gateway.example.com/prod/query?query_name=get_school_by_email"
      );
      const init = fetchFn.mock.calls[0][1];
      expect(init?.method).toBe("POST");
      expect(init?.headers).toEqual({ "Content-Type": "application/json", "x-api-key": "test-key" });
      expect(sentBody(0)).toEqual({ email: "school@example.com" });
    });

    it("returns null for an empty body", async () => {
      fetchFn.mockResolvedValue(respond(""));

      expect(await gateway.resolveSchoolId("school@example.com")).toBeNull();
    });

    it("returns null for an empty list", async () => {
      fetchFn.mockResolvedValue(respond("[]"));

      expect(await gateway.resolveSchoolId("school@example.com")).toBeNull();
    });
  });

  describe("insertSubject", () => {
    it("returns the inserted subject id", async () => {
      fetchFn.mockResolvedValue(respond(JSON.stringify({ inserted_subject_id: "s-9" })));

      const subjectId = await gateway.insertSubject({
        name: "Geography",
        grade: "5",
        section: "B",
        period: "3",
        schoolId: "12",
      });

      expect(subjectId).toBe("s-9");
      expect(sentBody(0)).toEqual({
        name: "Geography",
        grade: "5",
        section: "B",
        school_id: "12",
        period: "3",
      });
    });

    it("returns null when a success body is not JSON", async () => {
      fetchFn.mockResolvedValue(respond("OK"));

      const subjectId = await gateway.insertSubject({
        name: "Geography",
        grade: "5",
        section: "B",
        period: "3",
        schoolId: "12",
      });

      expect(subjectId).toBeNull();
    });

    it("throws GatewayError on a non-2xx response", async () => {
      fetchFn.mockResolvedValue(respond("boom", 500));

      await expect(
        gateway.insertSubject({ name: "Geography", grade: "5", section: "B", period: "3", schoolId: "12" })
      ).rejects.toBeInstanceOf(GatewayError);
    });
  });

  describe("insertLessonPlanner", () => {
    it("wraps the payload under lesson_planner", async () => {
      fetchFn.mockResolvedValue(respond(""));

      await gateway.insertLessonPlanner({ lesson_planner_UUID: "lp-1" });

      expect(fetchFn.mock.calls[0][0]).toBe(
        "https://gateway.example.com/prod/insert?query_name=insert_lesson_planner_payload"
      );
      expect(sentBody(0)).toEqual({ lesson_planner: { lesson_planner_UUID: "lp-1" } });
    });

    it("throws when a 200 body carries an error", async () => {
      fetchFn.mockResolvedValue(respond(JSON.stringify({ error: "duplicate key" })));

      await expect(gateway.insertLessonPlanner({ lesson_planner_UUID: "lp-1" })).rejects.toThrow(
        'insert_lesson_planner_payload failed: {"error":"duplicate key"}'
      );
    });

    it("throws with the status code on a non-2xx response", async () => {
      fetchFn.mockResolvedValue(respond("bad gateway", 502));

      await expect(gateway.insertLessonPlanner({ lesson_planner_UUID: "lp-1" })).rejects.toMatchObject({
        name: "GatewayError",
        statusCode: 502,
        body: "bad gateway",
      });
    });
  });

  describe("getStudentIdByEmail", () => {
    it("looks the student up in the fixed school", async () => {
      fetchFn.mockResolvedValue(respond(JSON.stringify([{ student_id: 41 }])));

      const studentId = await gateway.getStudentIdByEmail("ana@example.com");

      expect(studentId).toBe("41");
      expect(sentBody(0)).toEqual({ email: "ana@example.com", school_id: 3 });
    });

    it("returns null on a non-2xx response", async () => {
      fetchFn.mockResolvedValue(respond(JSON.stringify([{ student_id: 41 }]), 500));

      expect(await gateway.getStudentIdByEmail("ana@example.com")).toBeNull();
    });
  });

  describe("assignSubjectToStudent", () => {
    it("returns the parsed response", async () => {
      fetchFn.mockResolvedValue(respond(JSON.stringify({ status: "assigned" })));

      const response = await gateway.assignSubjectToStudent("41", "s-9");

      expect(response).toEqual({ status: "assigned" });
      expect(sentBody(0)).toEqual({
        student_id: "41",
        subject_id: "s-9",
        assigned_level_id: "",
        is_homeroom: "False",
        school_year_id: "",
      });
    });

    it("returns an empty object for an empty body", async () => {
      fetchFn.mockResolvedValue(respond(""));

      expect(await gateway.assignSubjectToStudent("41", "s-9")).toEqual({});
    });
  });
});
