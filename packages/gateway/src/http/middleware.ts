/**
 * HTTP Middleware — Multipart Intake
 *
 * POST /submit carries three named parts: payload, signature, artifact.
 * Parts are buffered in memory (multer memoryStorage); the artifact is never
 * written to disk.
 */

import { Request, RequestHandler } from 'express';
import multer from 'multer';
import type { RejectionReason, SubmissionEnvelope } from '../submission/index.js';

// =============================================================================
// UPLOAD PARSING
// =============================================================================

export interface SubmissionUploadConfig {
  maxArtifactBytes: number;
  maxFieldBytes?: number;
}

export const DEFAULT_MAX_FIELD_BYTES = 1024 * 1024;

/**
 * Multipart parser for the submit endpoint. Accepts each part either as a
 * plain form field or as a file part.
 */
export function submissionUpload(config: SubmissionUploadConfig): RequestHandler {
  return multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: config.maxArtifactBytes,
      fieldSize: config.maxFieldBytes ?? DEFAULT_MAX_FIELD_BYTES,
      files: 3,
      parts: 10,
    },
  }).any();
}

/**
 * Map a parser failure to a rejection reason.
 */
export function uploadErrorReason(err: unknown): RejectionReason {
  if (err instanceof multer.MulterError && err.code === 'LIMIT_FILE_SIZE') {
    return 'artifact_too_large';
  }
  return 'malformed_request';
}

// =============================================================================
// ENVELOPE EXTRACTION
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Collect the three parts after the upload parser ran. A part that did not
 * arrive stays undefined; nothing is inferred from the other parts.
 */
export function extractEnvelope(req: Request): SubmissionEnvelope {
  const files = Array.isArray(req.files) ? req.files : [];
  const body: unknown = req.body;

  const partBytes = (name: string): Buffer | undefined => {
    const file = files.find((f) => f.fieldname === name);
    if (file) return file.buffer;

    const value = isRecord(body) ? body[name] : undefined;
    return typeof value === 'string' ? Buffer.from(value, 'utf8') : undefined;
  };

  return {
    payload: partBytes('payload'),
    signature: partBytes('signature')?.toString('utf8'),
    artifact: partBytes('artifact'),
  };
}
