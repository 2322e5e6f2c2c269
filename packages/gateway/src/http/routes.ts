/**
 * HTTP API Routes
 *
 * Thin controllers - parse the transport, call the pipeline, map the decision.
 * No verification logic here.
 *
 * A rejected submission is a normal outcome: HTTP 200 with status "rejected".
 */

import { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import type {
  SubmissionDecision,
  SubmissionPipeline,
  SubmissionResponse,
  TaskDescriptor,
} from '../submission/index.js';
import type { TaskDirectory } from '../services/task-directory.js';
import { extractEnvelope, submissionUpload, uploadErrorReason } from './middleware.js';
import { Logger } from '../utils/logger.js';

// =============================================================================
// VALIDATION
// =============================================================================

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

function validateOptionalTaskId(value: unknown, fieldName: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value.length === 0) {
    throw new ValidationError(`${fieldName} must be a non-empty string`);
  }
  return value;
}

// =============================================================================
// ROUTE FACTORY
// =============================================================================

export interface RoutesConfig {
  pipeline: SubmissionPipeline;
  tasks: TaskDirectory;
  logger: Logger;
  maxArtifactBytes: number;
}

export function createRoutes(config: RoutesConfig): Router {
  const router = Router();
  const { pipeline, tasks, logger } = config;
  const upload: RequestHandler = submissionUpload({ maxArtifactBytes: config.maxArtifactBytes });

  // ===========================================================================
  // GET /get_task
  // Current task descriptor, or a specific one with ?task_id=
  // ===========================================================================
  router.get(
    '/get_task',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const taskId = validateOptionalTaskId(req.query.task_id, 'task_id');
        const task = taskId ? await tasks.get(taskId) : await tasks.current();

        if (!task) {
          res.status(404).json({ error: 'Task not found' });
          return;
        }

        res.json(toTaskResponse(task));
      } catch (error) {
        next(error);
      }
    }
  );

  // ===========================================================================
  // POST /submit
  // multipart: payload (JSON text), signature (hex text), artifact (binary)
  // ===========================================================================
  router.post(
    '/submit',
    (req: Request, res: Response, next: NextFunction) => {
      upload(req, res, (uploadError?: unknown) => {
        if (uploadError) {
          const reason = uploadErrorReason(uploadError);
          const message = uploadError instanceof Error ? uploadError.message : String(uploadError);
          res.json(toSubmissionResponse(pipeline.rejectEnvelope(reason, { error: message })));
          return;
        }

        pipeline
          .process(extractEnvelope(req))
          .then((decision) => {
            res.json(toSubmissionResponse(decision));
          })
          .catch((err: unknown) => {
            logger.error({ error: err }, 'Submission pipeline failed');
            next(err);
          });
      });
    }
  );

  // ===========================================================================
  // Health check
  // ===========================================================================
  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: Date.now() });
  });

  return router;
}

// =============================================================================
// RESPONSE MAPPING
// =============================================================================

export function toSubmissionResponse(decision: SubmissionDecision): SubmissionResponse {
  if (decision.status === 'accepted') {
    return { status: 'accepted', reason: null };
  }
  return { status: 'rejected', reason: decision.reason };
}

function toTaskResponse(task: TaskDescriptor): TaskDescriptor {
  return {
    task_id: task.task_id,
    performance_threshold: task.performance_threshold,
    validation_data_hash: task.validation_data_hash,
  };
}

// =============================================================================
// ERROR HANDLER MIDDLEWARE
// =============================================================================

export function errorHandler(logger: Logger) {
  return (err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ValidationError) {
      res.status(400).json({ error: err.message });
      return;
    }

    logger.error({ error: err }, 'Unhandled error');
    res.status(500).json({ error: 'Internal server error' });
  };
}
