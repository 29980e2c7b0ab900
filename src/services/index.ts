/**
 * Services Index
 *
 * Workflow services. Each takes its stores and clients through the
 * constructor; `createServices` in ../container wires the real ones.
 */

export { ProvisioningService } from "./provisioningService";
export type { ProvisionInput, ProvisioningServiceDeps } from "./provisioningService";

export { StudentSubjectLinker } from "./studentSubjectLinker";
export type { LinkResult } from "./studentSubjectLinker";

export { TestSeriesService, DEFAULT_POLLING } from "./testSeriesService";
export type { PollingOptions, TestSeriesServiceDeps } from "./testSeriesService";

export { CoursePlanService } from "./coursePlanService";
export type { CoursePlanServiceDeps } from "./coursePlanService";

export { sleep } from "./sleep";
export type { Sleep } from "./sleep";
