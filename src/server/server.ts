/**
 * Express Server
 *
 * HTTP layer of the pipeline. Routes:
 * - GET  /health             Server status and kill switch state
 * - POST /intake             Accept an intake message JSON and enqueue it
 * - POST /files              Upload one file (multipart field "file")
 * - POST /files/batch        Upload several files (multipart field "files")
 * - GET  /supported-formats  Accepted file extensions and size limits
 * - GET  /units              Recent processing units (?status=, ?limit=)
 * - GET  /units/:id          One unit with its attachments and stage results
 *
 * Intake routes return 503 while the kill switch is active and 202 once the
 * message is on the ingestion queue. Processing happens in the workers.
 *
 * No PII is logged — payloads are sanitized before any console output.
 */

import { randomUUID } from 'node:crypto';
import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { z } from 'zod';
import { getBlobStore } from '../blob/blob-store.js';
import { appConfig } from '../config.js';
import { SUPPORTED_EXTENSIONS, intakeConfig, isSupportedFilename } from '../intake/config.js';
import { intakeRejectReason } from '../intake/ingestion-coordinator.js';
import { errorMessage } from '../pipeline/errors.js';
import { IntakeMessageSchema, resolveIntakeUnitId } from '../queue/messages.js';
import type { FileIntakeMessage } from '../queue/messages.js';
import { enqueueIntake } from '../queue/queues.js';
import { getDocumentStore } from '../store/redis-store.js';
import { UNIT_STATUSES } from '../store/types.js';
import { healthHandler } from './health.js';
import { sanitizeForLog } from './sanitize.js';

/** Outcome of storing and enqueueing one uploaded file */
export interface UploadResult {
  filename: string;
  success: boolean;
  unitId?: string;
  jobId?: string;
  fileUri?: string;
  error?: string;
}

const ListUnitsQuerySchema = z.object({
  status: z.enum(UNIT_STATUSES).optional(),
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

// ---------------------------------------------------------------------------
// Upload handling
// ---------------------------------------------------------------------------

/**
 * Stores an uploaded file as a blob and enqueues a FILE intake message.
 * Each upload gets a fresh processing id, which is also its unit id.
 */
export async function acceptUpload(file: Express.Multer.File): Promise<UploadResult> {
  const filename = file.originalname;
  if (!isSupportedFilename(filename)) {
    return { filename, success: false, error: 'Unsupported file type' };
  }

  const processingId = randomUUID();
  const fileUri = await getBlobStore().put(file.buffer, `files/${processingId}/${filename}`, file.mimetype);

  const message: FileIntakeMessage = {
    source_type: 'file',
    processing_id: processingId,
    file_uri: fileUri,
    file_metadata: {
      id: processingId,
      filename,
      size: file.size,
      mime_type: file.mimetype,
    },
    timestamp: new Date().toISOString(),
  };
  const jobId = await enqueueIntake(message, processingId);

  console.log('[server] File accepted', { unitId: processingId, jobId, size: file.size });
  return { filename, success: true, unitId: processingId, jobId, fileUri };
}

function rejectWhenKilled(res: Response): boolean {
  if (!appConfig.killSwitch) return false;
  console.log('[server] Kill switch active — rejecting intake');
  res.status(503).json({ message: 'Automation disabled' });
  return true;
}

// ---------------------------------------------------------------------------
// App factory
// ---------------------------------------------------------------------------

/**
 * Create the Express application with all routes configured.
 *
 * Exported as a factory function so tests can create fresh app instances
 * without shared state between test cases.
 */
export function createApp() {
  const app = express();
  app.use(express.json({ limit: '5mb' }));

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: intakeConfig.uploadMaxBytes, files: intakeConfig.uploadMaxFiles },
  });

  app.get('/health', healthHandler);

  // Raw intake for external producers
  app.post('/intake', async (req: Request, res: Response) => {
    if (rejectWhenKilled(res)) return;

    const parsed = IntakeMessageSchema.safeParse(req.body);
    if (!parsed.success) {
      console.warn('[server] Invalid intake message', sanitizeForLog(req.body));
      res.status(400).json({
        error: 'Invalid intake message',
        issues: parsed.error.issues.map((issue) => issue.path.join('.') || '(root)'),
      });
      return;
    }

    const message = parsed.data;
    const rejection = intakeRejectReason(message);
    const unitId = resolveIntakeUnitId(message);
    if (rejection || !unitId) {
      res.status(400).json({ error: rejection ?? 'Intake has no unit id' });
      return;
    }

    const jobId = await enqueueIntake(message, unitId);
    console.log('[server] Intake enqueued', { unitId, jobId, sourceType: message.source_type });
    res.status(202).json({ accepted: true, unitId, jobId });
  });

  app.post('/files', upload.single('file'), async (req: Request, res: Response) => {
    if (rejectWhenKilled(res)) return;

    if (!req.file) {
      res.status(400).json({ error: 'No file uploaded. Use the multipart field "file".' });
      return;
    }

    const result = await acceptUpload(req.file);
    if (!result.success) {
      res.status(415).json({ error: result.error, supported: SUPPORTED_EXTENSIONS });
      return;
    }

    res.status(202).json({ accepted: true, unitId: result.unitId, jobId: result.jobId, fileUri: result.fileUri });
  });

  app.post('/files/batch', upload.array('files', intakeConfig.uploadMaxFiles), async (req: Request, res: Response) => {
    if (rejectWhenKilled(res)) return;

    const files = Array.isArray(req.files) ? req.files : [];
    if (files.length === 0) {
      res.status(400).json({ error: 'No files uploaded. Use the multipart field "files".' });
      return;
    }

    // Files are independent; one failure does not stop the rest
    const results: UploadResult[] = [];
    for (const file of files) {
      try {
        results.push(await acceptUpload(file));
      } catch (err) {
        console.error('[server] Upload failed', { filename: file.originalname, error: errorMessage(err) });
        results.push({ filename: file.originalname, success: false, error: errorMessage(err) });
      }
    }

    const successful = results.filter((r) => r.success).length;
    res.status(successful > 0 ? 202 : 400).json({
      results,
      total_files: files.length,
      successful,
      failed: files.length - successful,
    });
  });

  app.get('/supported-formats', (_req: Request, res: Response) => {
    res.json({
      extensions: SUPPORTED_EXTENSIONS,
      maxFileBytes: intakeConfig.uploadMaxBytes,
      maxBatchFiles: intakeConfig.uploadMaxFiles,
    });
  });

  // Read model
  app.get('/units', async (req: Request, res: Response) => {
    const query = ListUnitsQuerySchema.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({ error: 'Invalid query', issues: query.error.issues.map((i) => i.path.join('.')) });
      return;
    }

    const units = await getDocumentStore().listUnits(query.data);
    res.json({ units, count: units.length });
  });

  app.get('/units/:id', async (req: Request<{ id: string }>, res: Response) => {
    const store = getDocumentStore();
    const unit = await store.getUnit(req.params.id);
    if (!unit) {
      res.status(404).json({ error: 'Unit not found' });
      return;
    }

    const attachments = await store.listAttachments(unit.id);
    const detailed = await Promise.all(
      attachments.map(async (attachment) => ({
        ...attachment,
        ocr: await store.getOcrResult(unit.id, attachment.id),
        classification: await store.getClassification(unit.id, attachment.id),
      })),
    );

    res.json({ unit, attachments: detailed });
  });

  // Global error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof multer.MulterError) {
      const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      console.warn('[server] Upload rejected', { code: err.code });
      res.status(status).json({ error: err.message, code: err.code });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    console.error('[server] Unhandled error:', err.message);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
