/**
 * @fileoverview Schemas de validación usando Zod: documento de estado (todas sus versiones),
 * configuración y parámetros de los comandos del motor.
 * @module schemas
 */

import { z } from 'zod';
import {
  VALIDATIONS,
  CHECKSUM_ALGORITHMS,
  CHECKSUM_HEX_LENGTHS,
  MAX_PARALLEL_LIMIT,
  MAX_PATH_LENGTH,
  MAX_URL_LENGTH,
} from '../constants/validations';
import { ResultCode } from '../../shared/constants/resultCodes';
import { getErrorMessage } from './errors';

export interface ZodValidationResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

// --- Checksums ---

const checksumAlgorithmSchema = z.enum(CHECKSUM_ALGORITHMS, {
  errorMap: () => ({ message: VALIDATIONS.CHECKSUM.UNSUPPORTED_ALGORITHM }),
});

const checksumSpecSchema = z
  .object({
    algorithm: checksumAlgorithmSchema,
    expectedHex: z
      .string()
      .regex(/^[0-9a-fA-F]+$/, VALIDATIONS.CHECKSUM.INVALID_HEX)
      .transform(val => val.toLowerCase()),
  })
  .refine(
    spec => spec.expectedHex.length === CHECKSUM_HEX_LENGTHS[spec.algorithm],
    VALIDATIONS.CHECKSUM.INVALID_LENGTH
  );

const itemChecksumSchema = z
  .object({
    algorithm: checksumAlgorithmSchema,
    expectedHex: z.string().regex(/^[0-9a-f]+$/, VALIDATIONS.CHECKSUM.INVALID_HEX),
    verified: z.boolean(),
  })
  .refine(
    spec => spec.expectedHex.length === CHECKSUM_HEX_LENGTHS[spec.algorithm],
    VALIDATIONS.CHECKSUM.INVALID_LENGTH
  );

// --- Documento de estado: versión actual (2.x) ---

const downloadStatusSchema = z.enum([
  'queued',
  'downloading',
  'paused',
  'completed',
  'failed',
  'verifying',
  'cancelled',
]);

const resultCodeSchema = z.enum([
  ResultCode.SUCCESS,
  ResultCode.NETWORK_FAILURE,
  ResultCode.PROTOCOL_FAILURE,
  ResultCode.VERIFICATION_FAILURE,
  ResultCode.FILESYSTEM_FAILURE,
  ResultCode.CANCELLED,
]);

const idSchema = z
  .number()
  .int(VALIDATIONS.ID.MUST_BE_INTEGER)
  .positive(VALIDATIONS.ID.MUST_BE_POSITIVE);

const downloadItemSchema = z
  .object({
    id: idSchema,
    url: z.string().min(1),
    outputPath: z.string().min(1),
    status: downloadStatusSchema,
    bytesTransferred: z.number().int().nonnegative(),
    totalBytes: z.number().int().min(-1),
    checksum: itemChecksumSchema.nullable(),
    createdAt: z.number().int().nonnegative(),
    updatedAt: z.number().int().nonnegative(),
    completedAt: z.number().int().nonnegative().nullable(),
    lastError: z.string().nullable(),
    resultCode: resultCodeSchema.nullable(),
    retryCount: z.number().int().nonnegative(),
    attempts: z.number().int().nonnegative(),
  })
  .strict()
  .refine(item => item.totalBytes < 0 || item.bytesTransferred <= item.totalBytes, {
    message: 'bytesTransferred supera totalBytes',
    path: ['bytesTransferred'],
  })
  .refine(item => item.status !== 'completed' || !item.checksum || item.checksum.verified, {
    message: 'una descarga completada con checksum debe estar verificada',
    path: ['checksum'],
  });

const queueStateSchema = z
  .object({
    schemaVersion: z.string().regex(/^\d+\.\d+\.\d+$/),
    items: z.array(downloadItemSchema),
    lastAssignedId: z.number().int().nonnegative(),
  })
  .strict()
  .superRefine((doc, ctx) => {
    const seen = new Set<number>();
    for (const item of doc.items) {
      if (seen.has(item.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `ID duplicado: ${item.id}` });
      }
      seen.add(item.id);
      if (item.id > doc.lastAssignedId) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `lastAssignedId (${doc.lastAssignedId}) menor que el ID ${item.id}`,
        });
      }
    }
  });

// --- Versiones anteriores (solo la forma mínima que leen las migraciones) ---

const queueStateV1Schema = z.object({
  schemaVersion: z.literal('1.0.0'),
  items: z.array(
    z.object({
      id: z.number().int().positive(),
      url: z.string(),
      outputPath: z.string(),
      status: z.string(),
      bytesTransferred: z.number().nonnegative(),
      totalBytes: z.number(),
      checksum: z.string().nullable(),
      createdAt: z.string(),
      updatedAt: z.string(),
      lastError: z.string().nullable(),
    })
  ),
  lastAssignedId: z.number().int().nonnegative(),
});

const queueStateV0Schema = z.object({
  downloads: z.array(
    z.object({
      id: z.number().int().positive(),
      url: z.string(),
      output: z.string(),
      status: z.string(),
      downloaded: z.number().nonnegative().optional(),
      size: z.number().optional(),
      sha256: z.string().optional(),
      created: z.string().optional(),
      error: z.string().optional(),
    })
  ),
});

// --- Configuración ---

const nonNegative = z.number().min(0, VALIDATIONS.SETTINGS.RATE_NON_NEGATIVE);
const positiveInterval = z.number().positive(VALIDATIONS.SETTINGS.POSITIVE_INTERVAL);

const appConfigSchema = z.object({
  network: z.object({
    responseTimeout: positiveInterval,
    idleTimeout: positiveInterval,
    retryDelay: z.number().nonnegative(),
    maxRetryDelay: z.number().nonnegative(),
    maxRedirects: z.number().int().nonnegative(),
    userAgent: z.string().min(1),
  }),
  downloads: z.object({
    maxParallel: z
      .number()
      .int()
      .min(1, VALIDATIONS.SETTINGS.MAX_PARALLEL_RANGE)
      .max(MAX_PARALLEL_LIMIT, VALIDATIONS.SETTINGS.MAX_PARALLEL_RANGE),
    maxRetries: z.number().int().nonnegative(),
    maxRetryCommands: z.number().int().nonnegative(),
    progressUpdateInterval: positiveInterval,
    progressFlushInterval: positiveInterval,
    verifyBufferSize: z.number().int().positive(),
    partialSuffix: z.string().min(1),
  }),
  rateLimit: z.object({
    globalBytesPerSecond: nonNegative,
    perItemBytesPerSecond: nonNegative,
    burstBytes: z.number().positive().nullable(),
  }),
  timing: z.object({
    queueProcessInterval: positiveInterval,
    lockRetries: z.number().int().nonnegative(),
    lockRetryMinTimeout: z.number().nonnegative(),
    lockStaleMs: z.number().min(5000),
  }),
  paths: z.object({
    stateDir: z.string().min(1),
    stateFileName: z.string().min(1),
  }),
});

// --- Parámetros de comandos ---

const urlSchema = z
  .string()
  .min(1, VALIDATIONS.URL.CANNOT_BE_EMPTY)
  .max(MAX_URL_LENGTH, VALIDATIONS.URL.TOO_LONG)
  .transform(val => val.trim())
  .refine(val => {
    try {
      const parsed = new URL(val);
      return parsed.protocol === 'http:' || parsed.protocol === 'https:';
    } catch {
      return false;
    }
  }, VALIDATIONS.URL.MUST_BE_ABSOLUTE);

const outputPathSchema = z
  .string()
  .min(1, VALIDATIONS.PATH.CANNOT_BE_EMPTY)
  .max(MAX_PATH_LENGTH, VALIDATIONS.PATH.TOO_LONG)
  .refine(val => !val.includes('\0'), VALIDATIONS.PATH.NULL_BYTE);

const downloadIdSchema = z.coerce
  .number()
  .int(VALIDATIONS.ID.MUST_BE_INTEGER)
  .positive(VALIDATIONS.ID.MUST_BE_POSITIVE);

const rateLimitSettingsSchema = z.object({
  globalBytesPerSecond: nonNegative.optional(),
  perItemBytesPerSecond: nonNegative.optional(),
  burstBytes: z.number().positive().nullable().optional(),
});

export function validate<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown
): ZodValidationResult<z.output<S>> {
  try {
    const result = schema.safeParse(data);

    if (result.success) {
      return {
        success: true,
        data: result.data,
      };
    }
    const issues = result.error.issues ?? [];
    const errorMessages = issues.map((err: z.ZodIssue) => {
      const pathStr = err.path.length > 0 ? `${err.path.join('.')}: ` : '';
      return `${pathStr}${err.message}`;
    });

    return {
      success: false,
      error: errorMessages.join('; '),
    };
  } catch (error) {
    return {
      success: false,
      error: `${VALIDATIONS.GENERIC.VALIDATION_ERROR}: ${getErrorMessage(error)}`,
    };
  }
}

export function validateDownloadId(downloadId: unknown): ZodValidationResult<number> {
  return validate(downloadIdSchema, downloadId);
}

export function validateUrl(url: unknown): ZodValidationResult<string> {
  return validate(urlSchema, url);
}

export function validateOutputPath(outputPath: unknown): ZodValidationResult<string> {
  return validate(outputPathSchema, outputPath);
}

export function validateChecksumSpec(
  spec: unknown
): ZodValidationResult<z.output<typeof checksumSpecSchema>> {
  return validate(checksumSpecSchema, spec);
}

export function validateRateLimitSettings(
  params: unknown
): ZodValidationResult<z.output<typeof rateLimitSettingsSchema>> {
  return validate(rateLimitSettingsSchema, params);
}

export function validateQueueState(
  doc: unknown
): ZodValidationResult<z.output<typeof queueStateSchema>> {
  return validate(queueStateSchema, doc);
}

export type QueueStateV1 = z.output<typeof queueStateV1Schema>;
export type QueueStateV0 = z.output<typeof queueStateV0Schema>;

export const schemas = {
  checksumAlgorithm: checksumAlgorithmSchema,
  checksumSpec: checksumSpecSchema,
  itemChecksum: itemChecksumSchema,
  downloadStatus: downloadStatusSchema,
  downloadItem: downloadItemSchema,
  queueState: queueStateSchema,
  queueStateV1: queueStateV1Schema,
  queueStateV0: queueStateV0Schema,
  appConfig: appConfigSchema,
  url: urlSchema,
  outputPath: outputPathSchema,
  downloadId: downloadIdSchema,
  rateLimitSettings: rateLimitSettingsSchema,
};
