export * from "./app.js";
export * from "./db/fileStore.js";
export * from "./db/memoryStore.js";
export * from "./db/supabaseStore.js";
export type * from "./db/types.js";
export * from "./jobs/retrainModel.js";
export * from "./lib/errors.js";
export * from "./lib/logger.js";
export * from "./models/complaint.js";
export type * from "./models/customer.js";
export type * from "./models/feedback.js";
export type * from "./models/policy.js";
export type * from "./models/classifier.js";
export * from "./services/auditLogService.js";
export * from "./services/classifier.js";
export * from "./services/customerHistoryService.js";
export * from "./services/decisionService.js";
export * from "./services/fraudDetector.js";
export * from "./services/hybridEngine.js";
export * from "./services/intelligenceService.js";
export * from "./services/mailerService.js";
export * from "./services/policyEngine.js";
export * from "./services/sessionService.js";
