import { InsertSubjectInput, SchoolGateway } from "../clients/schoolGateway";
import { LessonPlannerPayload, LessonRecord, lessonPlannerPayloadSchema } from "../domain/lessonRecord";
import { LessonRecordStore } from "../stores/lessonRecordStore";
import { ProvisioningService } from "./provisioningService";

class FakeLessonRecordStore implements LessonRecordStore {
  saved: LessonRecord[] = [];
  failWith: Error | null = null;

  async save(record: LessonRecord): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.saved.push(record);
  }

  async getTenantEmail(): Promise<string | null> {
    return null;
  }
}

/**
 * Scriptable gateway: every method is a jest.fn with a happy-path default.
 */
function createGateway() {
  return {
    resolveSchoolId: jest.fn<Promise<string | null>, [string]>().mockResolvedValue("12"),
    insertSubject: jest.fn<Promise<string | null>, [InsertSubjectInput]>().mockResolvedValue("s-9"),
    insertSubjectTeacher: jest.fn<Promise<void>, [string, string]>().mockResolvedValue(undefined),
    insertLessonPlanner: jest.fn<Promise<void>, [Record<string, unknown>]>().mockResolvedValue(undefined),
    getStudentIdByEmail: jest.fn<Promise<string | null>, [string]>().mockResolvedValue(null),
    assignSubjectToStudent: jest
      .fn<Promise<unknown>, [string, string]>()
      .mockResolvedValue({ status: "assigned" }),
  } satisfies SchoolGateway;
}

describe("ProvisioningService", () => {
  let store: FakeLessonRecordStore;
  let gateway: ReturnType<typeof createGateway>;
  let service: ProvisioningService;

  const tenant = {
    email: "school@example.com",
    name: "Example School",
    iconUrl: "https://assets.example.com/icons/homework.png",
  };

  const lesson = (overrides: Record<string, unknown> = {}): LessonPlannerPayload =>
    lessonPlannerPayloadSchema.parse({
      lesson_planner_UUID: "lp-1",
      grade: "5",
      section: "B",
      period: "3",
      ...overrides,
    });

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
    store = new FakeLessonRecordStore();
    gateway = createGateway();
    service = new ProvisioningService({
      lessonRecordStore: store,
      gateway,
      tenant,
      now: () => new Date("2024-03-05T07:08:09Z"),
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("runs every step in order on the happy path", async () => {
    gateway.getStudentIdByEmail.mockResolvedValue("41");

    const outcome = await service.provision({
      subject: " Geography ",
      lesson: lesson({ teacher_id: 7, student: ["ana@example.com"] }),
    });

    expect(outcome).toEqual({
      ok: true,
      report: {
        lessonUUID: "lp-1",
        subjectId: "s-9",
        assignedStudents: [{ email: "ana@example.com", studentId: "41" }],
        notFoundStudents: [],
        failedAssignments: [],
        stepErrors: [],
      },
    });
    expect(store.saved).toHaveLength(1);
    expect(store.saved[0].Subject).toBe("Geography");
    expect(store.saved[0].Created_at).toBe("2024-03-05,07:08:09");
    expect(gateway.resolveSchoolId).toHaveBeenCalledWith("school@example.com");
    expect(gateway.insertSubject).toHaveBeenCalledWith({
      name: "Geography",
      grade: "5",
      section: "B",
      period: "3",
      schoolId: "12",
    });
    expect(gateway.assignSubjectToStudent).toHaveBeenCalledWith("41", "s-9");
    expect(gateway.insertSubjectTeacher).toHaveBeenCalledWith("s-9", "7");
    expect(gateway.insertLessonPlanner).toHaveBeenCalledWith(
      expect.objectContaining({ lesson_planner_UUID: "lp-1", teacher_id: 7 })
    );
  });

  it("partitions students into assigned, not found and failed", async () => {
    gateway.getStudentIdByEmail.mockImplementation(async (email) =>
      email === "ghost@example.com" ? null : email === "ana@example.com" ? "41" : "42"
    );
    gateway.assignSubjectToStudent.mockImplementation(async (studentId) =>
      studentId === "41" ? { status: "assigned" } : { status: "error", reason: "duplicate" }
    );

    const outcome = await service.provision({
      subject: "Geography",
      lesson: lesson({ student: ["ana@example.com", "ghost@example.com", "ben@example.com"] }),
    });

    if (!outcome.ok) throw new Error("expected provisioning to succeed");
    expect(outcome.report.assignedStudents).toEqual([{ email: "ana@example.com", studentId: "41" }]);
    expect(outcome.report.notFoundStudents).toEqual(["ghost@example.com"]);
    expect(outcome.report.failedAssignments).toEqual([
      { email: "ben@example.com", studentId: "42", response: { status: "error", reason: "duplicate" } },
    ]);
    expect(gateway.getStudentIdByEmail).toHaveBeenCalledTimes(3);
    expect(gateway.assignSubjectToStudent).toHaveBeenCalledTimes(2);
  });

  it("keeps going when one assignment throws", async () => {
    gateway.getStudentIdByEmail.mockImplementation(async (email) =>
      email === "ana@example.com" ? "41" : "42"
    );
    gateway.assignSubjectToStudent.mockImplementation(async (studentId) => {
      if (studentId === "41") {
        throw new Error("socket hang up");
      }
      return { status: "assigned" };
    });

    const outcome = await service.provision({
      subject: "Geography",
      lesson: lesson({ student: ["ana@example.com", "ben@example.com"] }),
    });

    if (!outcome.ok) throw new Error("expected provisioning to succeed");
    expect(outcome.report.failedAssignments).toEqual([
      { email: "ana@example.com", studentId: "41", response: "socket hang up" },
    ]);
    expect(outcome.report.assignedStudents).toEqual([{ email: "ben@example.com", studentId: "42" }]);
  });

  it("stops after a failed lesson record write", async () => {
    store.failWith = new Error("ProvisionedThroughputExceededException");

    const outcome = await service.provision({
      subject: "Geography",
      lesson: lesson({ teacher_id: 7, student: ["ana@example.com"] }),
    });

    expect(outcome).toEqual({
      ok: false,
      lessonUUID: "lp-1",
      error: { step: "createLessonRecord", message: "ProvisionedThroughputExceededException" },
    });
    expect(gateway.resolveSchoolId).not.toHaveBeenCalled();
    expect(gateway.insertSubject).not.toHaveBeenCalled();
    expect(gateway.getStudentIdByEmail).not.toHaveBeenCalled();
    expect(gateway.insertSubjectTeacher).not.toHaveBeenCalled();
    expect(gateway.insertLessonPlanner).not.toHaveBeenCalled();
  });

  it("skips subject-dependent steps when no school is registered", async () => {
    gateway.resolveSchoolId.mockResolvedValue(null);

    const outcome = await service.provision({
      subject: "Geography",
      lesson: lesson({ teacher_id: 7, student: ["ana@example.com"] }),
    });

    if (!outcome.ok) throw new Error("expected provisioning to succeed");
    expect(outcome.report.subjectId).toBeNull();
    expect(outcome.report.stepErrors).toEqual([
      { step: "registerSubject", message: "No school registered for school@example.com" },
    ]);
    expect(gateway.insertSubject).not.toHaveBeenCalled();
    expect(gateway.getStudentIdByEmail).not.toHaveBeenCalled();
    expect(gateway.insertSubjectTeacher).not.toHaveBeenCalled();
    expect(gateway.insertLessonPlanner).toHaveBeenCalledTimes(1);
  });

  it("records a subject insert failure and still persists the lesson planner", async () => {
    gateway.insertSubject.mockRejectedValue(new Error("insert_subject failed (HTTP 500): boom"));

    const outcome = await service.provision({ subject: "Geography", lesson: lesson() });

    if (!outcome.ok) throw new Error("expected provisioning to succeed");
    expect(outcome.report.stepErrors).toEqual([
      { step: "registerSubject", message: "insert_subject failed (HTTP 500): boom" },
    ]);
    expect(gateway.insertLessonPlanner).toHaveBeenCalledTimes(1);
  });

  it("skips the teacher relation without a teacher id", async () => {
    const outcome = await service.provision({ subject: "Geography", lesson: lesson() });

    if (!outcome.ok) throw new Error("expected provisioning to succeed");
    expect(gateway.insertSubjectTeacher).not.toHaveBeenCalled();
    expect(outcome.report.stepErrors).toEqual([]);
  });

  it("skips the teacher relation when the teacher id is null", async () => {
    const outcome = await service.provision({ subject: "Geography", lesson: lesson({ teacher_id: null }) });

    if (!outcome.ok) throw new Error("expected provisioning to succeed");
    expect(gateway.insertSubjectTeacher).not.toHaveBeenCalled();
    expect(gateway.insertLessonPlanner).toHaveBeenCalledWith(
      expect.objectContaining({ lesson_planner_UUID: "lp-1", teacher_id: null })
    );
    expect(outcome.report.stepErrors).toEqual([]);
  });

  it("records a failed student lookup as a step error", async () => {
    gateway.getStudentIdByEmail.mockImplementation(async (email) => {
      if (email === "ana@example.com") {
        throw new Error("gateway unavailable");
      }
      return "42";
    });

    const outcome = await service.provision({
      subject: "Geography",
      lesson: lesson({ student: ["ana@example.com", "ben@example.com"] }),
    });

    if (!outcome.ok) throw new Error("expected provisioning to succeed");
    expect(outcome.report.notFoundStudents).toEqual(["ana@example.com"]);
    expect(outcome.report.assignedStudents).toEqual([{ email: "ben@example.com", studentId: "42" }]);
    expect(outcome.report.stepErrors).toEqual([
      { step: "assignStudents", message: "Student lookup failed for ana@example.com: gateway unavailable" },
    ]);
  });

  it("reports teacher and lesson planner failures without failing the saga", async () => {
    gateway.insertSubjectTeacher.mockRejectedValue(new Error("teacher relation rejected"));
    gateway.insertLessonPlanner.mockRejectedValue(new Error("duplicate lesson planner"));

    const outcome = await service.provision({
      subject: "Geography",
      lesson: lesson({ teacher_id: "t-7" }),
    });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.report.subjectId).toBe("s-9");
    expect(outcome.report.stepErrors).toEqual([
      { step: "registerTeacher", message: "teacher relation rejected" },
      { step: "persistLessonPlanner", message: "duplicate lesson planner" },
    ]);
  });
});
