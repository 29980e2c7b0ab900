import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import { z } from "zod";

/**
 * Runtime configuration.
 *
 * Values come from process.env after `.env.<ENV>` (ENV defaults to
 * "Production") and `.env` have been loaded. Every variable except the
 * gateway and generator endpoints has a default.
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const intVar = (defaultValue: number) =>
  z.coerce.number().int().positive().default(defaultValue);

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const configSchema = z.object({
  API_PORT: intVar(3001),
  AWS_DEFAULT_REGION: z.string().default("us-west-2"),

  GRADE_SUBJECT_TABLE: z.string().default("Grade_and_Subject"),
  INVESTOR_TABLE: z.string().default("Investor"),
  ICP_TABLE: z.string().default("ICP"),
  QUIZ_TABLE: z.string().default("Question"),
  USER_ITP_TABLE: z.string().default("User_Infinite_TestSeries"),

  SCHOOL_GATEWAY_URL: z.string().url(),
  LESSON_PLANNER_API_KEY: z.string().min(1),
  URL_ITP_INITIALIZE: z.string().url(),
  URL_ICP_GENERATE: z.string().url(),

  PREDEFINED_MODULE_FUNCTION: z.string().default("createPredefinedModule"),
  PREDEFINED_MODULE_ALIAS: z.string().default("Production"),
  GENERATION_ENV: z.string().default("production"),

  TENANT_EMAIL: z.string().email().default("tenant@example.com"),
  TENANT_NAME: z.string().default("Example School"),
  LESSON_ICON_URL: z.string().url().default("https://assets.example.com/icons/homework.png"),
  STUDENT_LOOKUP_SCHOOL_ID: intVar(3),

  ITP_POLL_INTERVAL_MS: intVar(3000),
  ITP_POLL_MAX_ATTEMPTS: intVar(80),

  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
});

export interface AppConfig {
  port: number;
  awsRegion: string;
  tables: {
    lessons: string;
    students: string;
    coursePlans: string;
    predefinedJobs: string;
    userJobs: string;
  };
  gateway: {
    baseUrl: string;
    apiKey: string;
    studentLookupSchoolId: number;
  };
  generators: {
    testSeriesUrl: string;
    coursePlanUrl: string;
    environment: string;
  };
  predefinedModule: {
    functionName: string;
    alias: string;
  };
  tenant: {
    email: string;
    name: string;
    iconUrl: string;
  };
  polling: {
    intervalMs: number;
    maxAttempts: number;
  };
  openai: {
    apiKey?: string;
    model: string;
  };
}

/**
 * Load `.env.<ENV>` then `.env` from the working directory.
 * Variables already present in the environment are never overwritten.
 */
export function loadEnvFiles(cwd: string = process.cwd()): void {
  const env = process.env.ENV || "Production";
  for (const file of [`.env.${env}`, ".env"]) {
    const filePath = path.join(cwd, file);
    if (fs.existsSync(filePath)) {
      dotenv.config({ path: filePath });
    }
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `  - ${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("\n");
    throw new ConfigError(`Invalid environment configuration\n${details}`);
  }

  const raw = result.data;
  return {
    port: raw.API_PORT,
    awsRegion: raw.AWS_DEFAULT_REGION,
    tables: {
      lessons: raw.GRADE_SUBJECT_TABLE,
      students: raw.INVESTOR_TABLE,
      coursePlans: raw.ICP_TABLE,
      predefinedJobs: raw.QUIZ_TABLE,
      userJobs: raw.USER_ITP_TABLE,
    },
    gateway: {
      baseUrl: raw.SCHOOL_GATEWAY_URL.replace(/\/+$/, ""),
      apiKey: raw.LESSON_PLANNER_API_KEY,
      studentLookupSchoolId: raw.STUDENT_LOOKUP_SCHOOL_ID,
    },
    generators: {
      testSeriesUrl: raw.URL_ITP_INITIALIZE,
      coursePlanUrl: raw.URL_ICP_GENERATE,
      environment: raw.GENERATION_ENV,
    },
    predefinedModule: {
      functionName: raw.PREDEFINED_MODULE_FUNCTION,
      alias: raw.PREDEFINED_MODULE_ALIAS,
    },
    tenant: {
      email: raw.TENANT_EMAIL,
      name: raw.TENANT_NAME,
      iconUrl: raw.LESSON_ICON_URL,
    },
    polling: {
      intervalMs: raw.ITP_POLL_INTERVAL_MS,
      maxAttempts: raw.ITP_POLL_MAX_ATTEMPTS,
    },
    openai: {
      apiKey: raw.OPENAI_API_KEY,
      model: raw.OPENAI_MODEL,
    },
  };
}
