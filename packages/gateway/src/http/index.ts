/**
 * HTTP Module
 */

export { createRoutes, errorHandler, toSubmissionResponse, ValidationError } from './routes.js';
export type { RoutesConfig } from './routes.js';
export {
  submissionUpload,
  uploadErrorReason,
  extractEnvelope,
  DEFAULT_MAX_FIELD_BYTES,
} from './middleware.js';
export type { SubmissionUploadConfig } from './middleware.js';
