import { z } from 'zod';

export const MAX_QUERY_CHARS = 4_000;
export const MAX_BATCH_ITEMS = 100;

export const queryRequestSchema = z.object({
  query: z
    .string({ required_error: 'Query is required' })
    .trim()
    .min(1, 'Query is required and cannot be empty')
    .max(MAX_QUERY_CHARS, `Query cannot exceed ${MAX_QUERY_CHARS} characters`),
  evaluate: z.boolean().optional(),
});

const evaluationItemSchema = z.object({
  query: z.string({ required_error: 'query is required' }),
  response: z.string({ required_error: 'response is required' }),
});

export const evaluateRequestSchema = evaluationItemSchema;

export const evaluateBatchRequestSchema = z.object({
  items: z
    .array(evaluationItemSchema)
    .max(MAX_BATCH_ITEMS, `At most ${MAX_BATCH_ITEMS} items per batch`),
});

export type QueryRequestBody = z.infer<typeof queryRequestSchema>;
export type EvaluateRequestBody = z.infer<typeof evaluateRequestSchema>;
export type EvaluateBatchRequestBody = z.infer<typeof evaluateBatchRequestSchema>;

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: Array<{ path: string; message: string }> };

export function validateBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): ValidationResult<T> {
  const result = schema.safeParse(data);

  if (!result.success) {
    return {
      success: false,
      error: result.error.errors.map((e) => ({
        path: e.path.join('.') || 'root',
        message: e.message,
      })),
    };
  }

  return {
    success: true,
    data: result.data,
  };
}
