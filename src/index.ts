export const VERSION = '1.3.0';

export {
  analyzePosture,
  createAssessor,
  getDeskSetupTips,
  calculateScore,
  collectDeductions,
  classifySeverity,
  classifyIssue,
  classifyIssues,
  compose,
  PostureAssessor,
  DEFAULT_THRESHOLDS,
  PENALTIES,
} from './engine/index.js';
export type {
  FeedbackResult,
  MetricSet,
  MetricName,
  IssueKind,
  ReportedIssue,
  Severity,
  MetricCheck,
  MetricFinding,
  Deduction,
} from './engine/index.js';
export { parseAnalyzeRequest, parseMetrics, type AnalyzeRequest } from './api/payload.js';
export { toFeedbackBody, type FeedbackBody } from './api/response.js';
export { PostureServer, type ServerConfig } from './web/server.js';
export { loadConfig, type LoadConfigOptions } from './config/loader.js';
export type { PostureConfig, ValidationError } from './config/schema.js';
export { createLogger, getLogger, type LogLevel } from './observability/logger.js';
