/**
 * Prism - Agent Module
 */

export { AnalyticsAgent, runAgent, type AnalyticsAgentDeps } from './pipeline.js';
export { detectOutliers } from './outliers.js';
export { buildExplanation } from './explanation.js';
export { toCsv, responseToCsv, exportFileName } from './export.js';
export { DENIED_ALTERNATIVE } from './types.js';

export type {
  AgentResponse,
  AgentStatus,
  SuccessResponse,
  DeniedResponse,
  ErrorResponse,
  ResultRow,
} from './types.js';
