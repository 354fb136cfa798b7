/**
 * Entity Pipeline - Zod Validation Schemas
 *
 * Input validation for extraction options and every MCP tool input.
 * Each schema includes:
 * - Type validation
 * - Constraint validation (min/max, mutually exclusive fields)
 * - Descriptive error messages
 * - Default values where appropriate
 *
 * @module utils/validation
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

function formatIssues(error: z.ZodError): string {
  return error.errors
    .map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    })
    .join('; ');
}

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @returns Validated and typed input data (defaults applied)
 * @throws ValidationError with descriptive message if validation fails
 */
export function validateInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Safely validate input without throwing, returns result object
 */
export function safeValidateInput<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown
): { success: true; data: z.output<S> } | { success: false; error: ValidationError } {
  const result = schema.safeParse(input);
  if (!result.success) {
    return { success: false, error: new ValidationError(formatIssues(result.error)) };
  }
  return { success: true, data: result.data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED BASE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/** Maximum characters per annotation chunk */
export const MaxChunkSize = z
  .number({ invalid_type_error: 'max_chunk_size must be a number' })
  .int('max_chunk_size must be an integer')
  .min(1, 'max_chunk_size must be at least 1')
  .max(10_000_000, 'max_chunk_size must be 10,000,000 or less');

/** Characters searched backward for a safe chunk end */
export const BoundaryWindow = z
  .number({ invalid_type_error: 'boundary_window must be a number' })
  .int('boundary_window must be an integer')
  .min(0, 'boundary_window cannot be negative')
  .max(100_000, 'boundary_window must be 100,000 or less');

/** Engine profile: "gazetteer" or a spaCy model name */
export const EngineProfile = z
  .string({ invalid_type_error: 'engine_profile must be a string' })
  .min(1, 'Engine profile is required')
  .regex(/^[A-Za-z0-9_.-]+$/, 'Engine profile must contain only letters, digits, ".", "_" and "-"');

/**
 * Options accepted by the extraction pipeline
 */
export const ExtractionOptionsSchema = z.object({
  maxChunkSize: MaxChunkSize,
  boundaryWindow: BoundaryWindow,
  coreference: z.boolean(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// ENTITY TOOL SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const TextSourceFields = {
  text: z.string().optional(),
  file_path: z.string().min(1, 'File path cannot be empty').optional(),
};

function hasOneSource(input: { text?: string; file_path?: string }): boolean {
  return (input.text !== undefined) !== (input.file_path !== undefined);
}

const ONE_SOURCE_MESSAGE = 'Provide exactly one of text or file_path';

/**
 * Schema for extracting entities from a document
 */
export const EntityExtractInput = z
  .object({
    ...TextSourceFields,
    max_chunk_size: MaxChunkSize.optional(),
    boundary_window: BoundaryWindow.optional(),
    coreference: z.boolean().optional(),
    include_chunks: z.boolean().default(false),
  })
  .refine(hasOneSource, { message: ONE_SOURCE_MESSAGE });

/**
 * Schema for previewing chunk boundaries
 */
export const ChunkPlanInput = z
  .object({
    ...TextSourceFields,
    max_chunk_size: MaxChunkSize.optional(),
    boundary_window: BoundaryWindow.optional(),
  })
  .refine(hasOneSource, { message: ONE_SOURCE_MESSAGE });

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Configuration keys that can be read and set
 */
export const ConfigKey = z.enum([
  'max_chunk_size',
  'boundary_window',
  'engine_profile',
  'coreference',
  'python_path',
  'worker_timeout_ms',
  'gazetteer_path',
]);

export type ConfigKeyName = z.infer<typeof ConfigKey>;

/**
 * Full server configuration. Field messages name the config keys users set.
 */
export const ServerConfigSchema = z.object({
  maxChunkSize: MaxChunkSize,
  boundaryWindow: BoundaryWindow,
  engineProfile: EngineProfile,
  coreference: z.boolean({ invalid_type_error: 'coreference must be a boolean' }),
  pythonPath: z.string({ invalid_type_error: 'python_path must be a string' }).min(1, 'python_path cannot be empty'),
  workerTimeoutMs: z
    .number({ invalid_type_error: 'worker_timeout_ms must be a number' })
    .int('worker_timeout_ms must be an integer')
    .min(1000, 'worker_timeout_ms must be at least 1000')
    .max(3_600_000, 'worker_timeout_ms must be 3,600,000 or less'),
  gazetteerPath: z
    .string({ invalid_type_error: 'gazetteer_path must be a string' })
    .min(1, 'gazetteer_path cannot be empty'),
});

/**
 * Schema for getting configuration
 */
export const ConfigGetInput = z.object({
  key: ConfigKey.optional(),
});

/**
 * Schema for setting configuration
 */
export const ConfigSetInput = z.object({
  key: ConfigKey,
  value: z.union([z.string(), z.number(), z.boolean()]),
});
