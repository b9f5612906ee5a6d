import { z } from 'zod';
import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_MARKER_TYPE,
  type MarkerCodec,
} from '@deltaflow/shared';

/**
 * Zod schema for a single table descriptor.
 * Marker validation depends on the codecs available, so the schema is built per registry.
 * Parses to the descriptor fields and the codec its markers use.
 */
export function createTableDescriptorSchema(codecs: ReadonlyMap<string, MarkerCodec>) {
  return z
    .object({
      id: z.string().trim().min(1, 'id is required'),
      changeColumn: z.string().trim().min(1, 'changeColumn is required'),
      batchSize: z.number().int().positive().default(DEFAULT_BATCH_SIZE),
      markerType: z.string().default(DEFAULT_MARKER_TYPE),
      initialMarker: z.string().optional(),
      maxPages: z.number().int().positive().optional(),
      timeoutMs: z.number().int().positive().optional(),
      params: z.record(z.string()).default({}),
    })
    .transform((value, ctx) => {
      const codec = codecs.get(value.markerType);
      if (!codec) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['markerType'],
          message: `unknown marker type '${value.markerType}' (available: ${Array.from(codecs.keys()).join(', ')})`,
        });
        return z.NEVER;
      }
      if (value.initialMarker !== undefined && !codec.isValid(value.initialMarker)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['initialMarker'],
          message: `'${value.initialMarker}' is not a valid ${codec.type} marker`,
        });
        return z.NEVER;
      }
      return { descriptor: value, codec };
    });
}

/** Registry files hold either a bare array or `{ "tables": [...] }`. */
export const registryDocumentSchema = z.union([
  z.array(z.unknown()),
  z.object({ tables: z.array(z.unknown()) }).transform((doc) => doc.tables),
]);

export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
