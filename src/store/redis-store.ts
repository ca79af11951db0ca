/**
 * Redis Document Store
 *
 * DocumentStore backed by Redis hashes:
 *
 *   {prefix}:unit:{id}                          hash  ProcessingUnit
 *   {prefix}:units                              zset  unit ids scored by createdAt (read model)
 *   {prefix}:unit:{id}:attachments              zset  attachment ids scored by sequence number
 *   {prefix}:attachment:{attachmentId}          hash  AttachmentUnit
 *   {prefix}:ocr:{unitId}:{attachmentId}        hash  OcrResultRecord
 *   {prefix}:classification:{unitId}:{attId}    hash  ClassificationRecord
 *
 * Upserts write metadata with HSET and creation-only fields (status,
 * createdAt, statusVersion, attachmentCount) with HSETNX inside one MULTI,
 * so a redelivered intake never regresses a unit. Status changes go through a Lua
 * compare-and-set so concurrent completions cannot both win.
 */

import { Redis as IORedis } from 'ioredis';
import { appConfig } from '../config.js';
import { createRedisConnection } from '../queue/queues.js';
import {
  DOCUMENT_TYPES,
  ExtractedEntitySchema,
  PRIORITIES,
  RISK_LEVELS,
} from '../classification/types.js';
import type { DocumentType, ExtractedEntity } from '../classification/types.js';
import {
  ATTACHMENT_STATUSES,
  UNIT_STATUSES,
  attachmentIdFor,
} from './types.js';
import type {
  AttachmentInput,
  AttachmentPatch,
  AttachmentUnit,
  CasOutcome,
  ClassificationRecord,
  DocumentStore,
  ListUnitsOptions,
  OcrResultRecord,
  ProcessingUnit,
  UnitInput,
  UnitStatus,
  UpsertUnitResult,
} from './types.js';

type Hash = Record<string, string>;

const DEFAULT_LIST_LIMIT = 50;

// ---------------------------------------------------------------------------
// Compare-and-set script
// ---------------------------------------------------------------------------

/**
 * KEYS[1] unit hash; ARGV expected, next, updatedAt, lastError ('' = none).
 * Returns 1 updated, 0 conflict, -1 missing.
 */
const CAS_STATUS_SCRIPT = `
local current = redis.call('HGET', KEYS[1], 'status')
if not current then return -1 end
if current ~= ARGV[1] then return 0 end
redis.call('HSET', KEYS[1], 'status', ARGV[2], 'updatedAt', ARGV[3])
redis.call('HINCRBY', KEYS[1], 'statusVersion', 1)
if ARGV[4] ~= '' then redis.call('HSET', KEYS[1], 'lastError', ARGV[4]) end
return 1
`;

// ---------------------------------------------------------------------------
// Field encoding
// ---------------------------------------------------------------------------

function oneOf<T extends string>(values: readonly T[], raw: string | undefined, fallback: T): T {
  return values.find((value) => value === raw) ?? fallback;
}

function str(raw: string | undefined): string | null {
  return raw === undefined || raw === '' ? null : raw;
}

function num(raw: string | undefined): number | null {
  if (raw === undefined || raw === '') return null;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : null;
}

function stringList(raw: string | undefined): string[] {
  if (!raw) return [];
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.filter((v): v is string => typeof v === 'string') : [];
}

function entityList(raw: string | undefined): ExtractedEntity[] {
  if (!raw) return [];
  const parsed = ExtractedEntitySchema.array().safeParse(JSON.parse(raw));
  return parsed.success ? parsed.data : [];
}

function documentType(raw: string | undefined): DocumentType | null {
  return raw ? oneOf(DOCUMENT_TYPES, raw, 'UNCLASSIFIED') : null;
}

/** Drops undefined/null so HSET only writes supplied fields */
function toHash(fields: Record<string, string | number | string[] | null | undefined>): Hash {
  const hash: Hash = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined || value === null) continue;
    hash[key] = Array.isArray(value) ? JSON.stringify(value) : String(value);
  }
  return hash;
}

function decodeUnit(hash: Hash): ProcessingUnit {
  return {
    id: hash.id,
    processingId: hash.processingId ?? hash.id,
    sourceType: hash.sourceType === 'FILE' ? 'FILE' : 'EMAIL',
    status: oneOf(UNIT_STATUSES, hash.status, 'PENDING'),
    statusVersion: num(hash.statusVersion) ?? 0,
    attachmentCount: num(hash.attachmentCount) ?? 0,
    lastError: str(hash.lastError),
    emailFrom: str(hash.emailFrom),
    emailTo: stringList(hash.emailTo),
    emailCc: stringList(hash.emailCc),
    emailSubject: str(hash.emailSubject),
    emailBody: str(hash.emailBody),
    emailDate: str(hash.emailDate),
    emailTime: str(hash.emailTime),
    emailUri: str(hash.emailUri),
    filename: str(hash.filename),
    fileUri: str(hash.fileUri),
    fileSize: num(hash.fileSize),
    createdAt: hash.createdAt,
    updatedAt: hash.updatedAt ?? hash.createdAt,
  };
}

function decodeAttachment(hash: Hash): AttachmentUnit {
  return {
    id: hash.id,
    parentId: hash.parentId,
    sequenceNumber: num(hash.sequenceNumber) ?? 0,
    filename: hash.filename ?? '',
    blobUri: hash.blobUri ?? '',
    status: oneOf(ATTACHMENT_STATUSES, hash.status, 'PENDING'),
    ocrText: str(hash.ocrText),
    ocrConfidence: num(hash.ocrConfidence),
    classificationType: documentType(hash.classificationType),
    classificationConfidence: num(hash.classificationConfidence),
    createdAt: hash.createdAt,
    updatedAt: hash.updatedAt ?? hash.createdAt,
  };
}

function decodeOcrResult(hash: Hash): OcrResultRecord {
  return {
    unitId: hash.unitId,
    attachmentId: hash.attachmentId,
    fileUri: hash.fileUri ?? '',
    extractedText: hash.extractedText ?? '',
    confidenceScore: num(hash.confidenceScore) ?? 0,
    pageCount: num(hash.pageCount) ?? 0,
    processingTimeSeconds: num(hash.processingTimeSeconds) ?? 0,
    status: hash.status === 'COMPLETED' ? 'COMPLETED' : 'FAILED',
    extractor: hash.extractor ?? 'unknown',
    error: str(hash.error),
    createdAt: hash.createdAt,
  };
}

function decodeClassification(hash: Hash): ClassificationRecord {
  return {
    unitId: hash.unitId,
    attachmentId: hash.attachmentId,
    fileUri: hash.fileUri ?? '',
    documentType: oneOf(DOCUMENT_TYPES, hash.documentType, 'UNCLASSIFIED'),
    confidence: num(hash.confidence) ?? 0,
    extractedEntities: entityList(hash.extractedEntities),
    riskAssessment: oneOf(RISK_LEVELS, hash.riskAssessment, 'UNKNOWN'),
    priority: oneOf(PRIORITIES, hash.priority, 'LOW'),
    summary: str(hash.summary),
    keyFindings: stringList(hash.keyFindings),
    error: str(hash.error),
    createdAt: hash.createdAt,
  };
}

function isEmpty(hash: Hash): boolean {
  return Object.keys(hash).length === 0;
}

// ---------------------------------------------------------------------------
// RedisDocumentStore
// ---------------------------------------------------------------------------

export class RedisDocumentStore implements DocumentStore {
  private readonly redis: IORedis;
  private readonly prefix: string;

  constructor(redis: IORedis, prefix: string = appConfig.store.keyPrefix) {
    this.redis = redis;
    this.prefix = prefix;
  }

  // ----- Keys -----

  private unitKey(id: string): string {
    return `${this.prefix}:unit:${id}`;
  }

  private unitIndexKey(): string {
    return `${this.prefix}:units`;
  }

  private attachmentIndexKey(unitId: string): string {
    return `${this.prefix}:unit:${unitId}:attachments`;
  }

  private attachmentKey(attachmentId: string): string {
    return `${this.prefix}:attachment:${attachmentId}`;
  }

  private ocrKey(unitId: string, attachmentId: string): string {
    return `${this.prefix}:ocr:${unitId}:${attachmentId}`;
  }

  private classificationKey(unitId: string, attachmentId: string): string {
    return `${this.prefix}:classification:${unitId}:${attachmentId}`;
  }

  // ----- Units -----

  async getUnit(id: string): Promise<ProcessingUnit | null> {
    const hash = await this.redis.hgetall(this.unitKey(id));
    return isEmpty(hash) ? null : decodeUnit(hash);
  }

  async upsertUnit(input: UnitInput): Promise<UpsertUnitResult> {
    const key = this.unitKey(input.id);
    const now = new Date();
    const metadata = toHash({
      id: input.id,
      processingId: input.processingId,
      sourceType: input.sourceType,
      emailFrom: input.emailFrom,
      emailTo: input.emailTo,
      emailCc: input.emailCc,
      emailSubject: input.emailSubject,
      emailBody: input.emailBody,
      emailDate: input.emailDate,
      emailTime: input.emailTime,
      emailUri: input.emailUri,
      filename: input.filename,
      fileUri: input.fileUri,
      fileSize: input.fileSize,
    });

    const results = await this.redis
      .multi()
      .hsetnx(key, 'status', 'PROCESSING')
      .hsetnx(key, 'createdAt', now.toISOString())
      .hsetnx(key, 'updatedAt', now.toISOString())
      .hsetnx(key, 'statusVersion', '0')
      .hsetnx(key, 'attachmentCount', String(input.attachmentCount))
      .hset(key, metadata)
      .zadd(this.unitIndexKey(), 'NX', now.getTime(), input.id)
      .exec();

    const created = results?.[0]?.[1] === 1;
    const unit = await this.getUnit(input.id);
    if (!unit) {
      throw new Error(`Unit ${input.id} not readable after upsert`);
    }
    return { unit, created };
  }

  async compareAndSetStatus(
    id: string,
    expected: UnitStatus,
    next: UnitStatus,
    lastError?: string,
  ): Promise<CasOutcome> {
    const result = await this.redis.eval(
      CAS_STATUS_SCRIPT,
      1,
      this.unitKey(id),
      expected,
      next,
      new Date().toISOString(),
      lastError ?? '',
    );
    if (result === 1) return 'updated';
    if (result === 0) return 'conflict';
    return 'missing';
  }

  async listUnits(options: ListUnitsOptions = {}): Promise<ProcessingUnit[]> {
    const limit = options.limit ?? DEFAULT_LIST_LIMIT;
    // Over-fetch when filtering so a status filter still fills the page
    const window = options.status ? limit * 4 : limit;
    const ids = await this.redis.zrevrange(this.unitIndexKey(), 0, window - 1);
    const hashes = await this.hgetallMany(ids.map((id) => this.unitKey(id)));

    return hashes
      .filter((hash) => !isEmpty(hash))
      .map(decodeUnit)
      .filter((unit) => !options.status || unit.status === options.status)
      .slice(0, limit);
  }

  // ----- Attachments -----

  async upsertAttachment(input: AttachmentInput): Promise<AttachmentUnit> {
    const id = attachmentIdFor(input.parentId, input.sequenceNumber);
    const key = this.attachmentKey(id);
    const now = new Date().toISOString();

    await this.redis
      .multi()
      .hsetnx(key, 'status', 'PENDING')
      .hsetnx(key, 'createdAt', now)
      .hsetnx(key, 'updatedAt', now)
      .hset(key, toHash({
        id,
        parentId: input.parentId,
        sequenceNumber: input.sequenceNumber,
        filename: input.filename,
        blobUri: input.blobUri,
      }))
      .zadd(this.attachmentIndexKey(input.parentId), input.sequenceNumber, id)
      .exec();

    const attachment = await this.getAttachment(id);
    if (!attachment) {
      throw new Error(`Attachment ${id} not readable after upsert`);
    }
    return attachment;
  }

  async getAttachment(attachmentId: string): Promise<AttachmentUnit | null> {
    const hash = await this.redis.hgetall(this.attachmentKey(attachmentId));
    return isEmpty(hash) ? null : decodeAttachment(hash);
  }

  async listAttachments(unitId: string): Promise<AttachmentUnit[]> {
    const ids = await this.redis.zrange(this.attachmentIndexKey(unitId), 0, -1);
    const hashes = await this.hgetallMany(ids.map((id) => this.attachmentKey(id)));
    return hashes.filter((hash) => !isEmpty(hash)).map(decodeAttachment);
  }

  async updateAttachment(attachmentId: string, patch: AttachmentPatch): Promise<void> {
    await this.redis.hset(
      this.attachmentKey(attachmentId),
      toHash({ ...patch, updatedAt: new Date().toISOString() }),
    );
  }

  // ----- Results -----

  async saveOcrResult(result: OcrResultRecord): Promise<void> {
    const key = this.ocrKey(result.unitId, result.attachmentId);
    // Overwrite: a re-attempt replaces the previous outcome entirely
    await this.redis.multi().del(key).hset(key, toHash({ ...result })).exec();
  }

  async getOcrResult(unitId: string, attachmentId: string): Promise<OcrResultRecord | null> {
    const hash = await this.redis.hgetall(this.ocrKey(unitId, attachmentId));
    return isEmpty(hash) ? null : decodeOcrResult(hash);
  }

  async saveClassification(result: ClassificationRecord): Promise<void> {
    const key = this.classificationKey(result.unitId, result.attachmentId);
    const { extractedEntities, ...rest } = result;
    await this.redis
      .multi()
      .del(key)
      .hset(key, { ...toHash({ ...rest }), extractedEntities: JSON.stringify(extractedEntities) })
      .exec();
  }

  async getClassification(unitId: string, attachmentId: string): Promise<ClassificationRecord | null> {
    const hash = await this.redis.hgetall(this.classificationKey(unitId, attachmentId));
    return isEmpty(hash) ? null : decodeClassification(hash);
  }

  // ----- Helpers -----

  private async hgetallMany(keys: string[]): Promise<Hash[]> {
    if (keys.length === 0) return [];
    const pipeline = this.redis.pipeline();
    for (const key of keys) pipeline.hgetall(key);
    const results = (await pipeline.exec()) ?? [];

    return results.map(([err, value]) => {
      if (err) throw err;
      return isHash(value) ? value : {};
    });
  }
}

function isHash(value: unknown): value is Hash {
  return (
    value !== null &&
    typeof value === 'object' &&
    Object.values(value).every((v) => typeof v === 'string')
  );
}

// ---------------------------------------------------------------------------
// Singleton
// ---------------------------------------------------------------------------

let _redis: IORedis | null = null;
let _store: RedisDocumentStore | null = null;

/**
 * Returns the process-wide Redis document store.
 * The connection is created on first call, never at import time.
 */
export function getDocumentStore(): RedisDocumentStore {
  if (_store) return _store;
  _redis = new IORedis(createRedisConnection());
  _store = new RedisDocumentStore(_redis);
  return _store;
}

/** Close the store connection for graceful shutdown */
export async function closeDocumentStore(): Promise<void> {
  if (_redis) {
    await _redis.quit();
    _redis = null;
    _store = null;
  }
}
