import { z } from 'zod';

export const onFailSchema = z.enum(['stop', 'skip', 'retry', 'ask_user']);

export const guardSchema = z.union([z.boolean(), z.string()]);

/**
 * Field-level shape of one step. Id uniqueness, dependency references and
 * cycles are graph checks and live in the validator.
 */
export const stepDescriptionSchema = z.object({
  id: z.string({ required_error: "Step is missing required field 'id'" })
    .min(1, 'Step id must be a non-empty string'),
  tool: z.string({ required_error: "Step is missing required field 'tool'" })
    .min(1, 'Step tool must be a non-empty string'),
  name: z.string().optional(),
  params: z.record(z.unknown()).optional(),
  depends_on: z.array(z.string()).optional(),
  guard: guardSchema.optional(),
  order: z.number().optional(),
  on_fail: onFailSchema.optional(),
  retries: z.number().int().min(0).optional(),
}).passthrough();

export const procedureDescriptionSchema = z.object({
  name: z.string({ required_error: "Missing required field 'name'" })
    .min(1, 'Procedure name must be a non-empty string'),
  description: z.string({ required_error: "Missing required field 'description'" }),
  goal: z.string().optional(),
  tags: z.array(z.string()).optional(),
  steps: z.array(stepDescriptionSchema, { required_error: "Missing required field 'steps'" })
    .min(1, 'Procedure must have at least one step'),
  metadata: z.record(z.unknown()).optional(),
}).passthrough();
