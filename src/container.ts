import { LambdaClient } from "@aws-sdk/client-lambda";
import { HttpCourseGenerator, HttpTestSeriesGenerator } from "./clients/generators";
import { LambdaModuleInvoker } from "./clients/moduleInvoker";
import { HttpSchoolGateway } from "./clients/schoolGateway";
import { AppConfig } from "./config";
import { QuestionGenerator } from "./domain/questionGenerator";
import {
  CoursePlanService,
  ProvisioningService,
  StudentSubjectLinker,
  TestSeriesService,
} from "./services";
import { DynamoCoursePlanStore } from "./stores/coursePlanStore";
import { createDocumentClient } from "./stores/dynamo";
import { DynamoGenerationJobStore } from "./stores/generationJobStore";
import { DynamoLessonRecordStore } from "./stores/lessonRecordStore";
import { DynamoStudentStore } from "./stores/studentStore";

export interface Services {
  provisioning: ProvisioningService;
  linker: StudentSubjectLinker;
  testSeries: TestSeriesService;
  coursePlans: CoursePlanService;
  questions: QuestionGenerator;
}

/**
 * Build every client once and wire them into the services.
 */
export function createServices(config: AppConfig): Services {
  const documentClient = createDocumentClient(config.awsRegion);
  const lambdaClient = new LambdaClient({ region: config.awsRegion });

  const lessonRecordStore = new DynamoLessonRecordStore(documentClient, config.tables.lessons);
  const studentStore = new DynamoStudentStore(documentClient, config.tables.students);
  const jobStore = new DynamoGenerationJobStore(documentClient, {
    predefinedTable: config.tables.predefinedJobs,
    userTable: config.tables.userJobs,
  });
  const coursePlanStore = new DynamoCoursePlanStore(documentClient, config.tables.coursePlans);

  const gateway = new HttpSchoolGateway(config.gateway);

  return {
    provisioning: new ProvisioningService({
      lessonRecordStore,
      gateway,
      tenant: config.tenant,
    }),
    linker: new StudentSubjectLinker(studentStore),
    testSeries: new TestSeriesService({
      generator: new HttpTestSeriesGenerator(config.generators.testSeriesUrl),
      jobStore,
      polling: config.polling,
    }),
    coursePlans: new CoursePlanService({
      generator: new HttpCourseGenerator(config.generators.coursePlanUrl),
      coursePlanStore,
      lessonRecordStore,
      moduleInvoker: new LambdaModuleInvoker({
        client: lambdaClient,
        functionName: config.predefinedModule.functionName,
        alias: config.predefinedModule.alias,
      }),
      environment: config.generators.environment,
    }),
    questions: new QuestionGenerator(config.openai.apiKey, config.openai.model),
  };
}
