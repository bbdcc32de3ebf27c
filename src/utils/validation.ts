/**
 * Grant Graph MCP - Zod Validation Helpers
 *
 * Input validation shared by every tool module, plus the enum schemas for
 * node types and relationship labels.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import { NODE_TYPES, RELATIONSHIP_TYPES } from '../models/grant-graph.js';

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

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @param schema - Zod schema to validate against
 * @param input - Input value to validate
 * @returns Validated and typed input data
 * @throws ValidationError with descriptive message if validation fails
 */
export function validateInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED ENUMS
// ═══════════════════════════════════════════════════════════════════════════════

export const NodeTypeSchema = z.enum(NODE_TYPES);

export const RelationshipTypeSchema = z.enum(RELATIONSHIP_TYPES);

/**
 * Optional filters that also accept an empty string as "no filter", the
 * way agent callers often send unset enum arguments.
 */
export const OptionalNodeTypeFilter = z
  .union([NodeTypeSchema, z.literal('')])
  .optional()
  .transform((value) => (value === '' ? undefined : value));

export const OptionalRelationshipFilter = z
  .union([RelationshipTypeSchema, z.literal('')])
  .optional()
  .transform((value) => (value === '' ? undefined : value));
