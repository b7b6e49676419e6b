/**
 * Local contract checks for canonical requests, run before any network call.
 */

import { z } from 'zod';
import { InvalidOptionError } from './errors.js';
import type { CanonicalRequest } from './types.js';

// =============================================================================
// Schemas
// =============================================================================

const positiveSeconds = z.number().finite().positive();

export const MessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string(),
});

export const TimeoutSchema = z.union([
  positiveSeconds,
  z.tuple([positiveSeconds, positiveSeconds]),
]);

export const ReasoningSchema = z
  .object({
    enabled: z.boolean(),
    max_tokens: z.number().int().positive().optional(),
    effort: z.enum(['low', 'medium', 'high']).optional(),
  })
  .refine((reasoning) => reasoning.max_tokens === undefined || reasoning.effort === undefined, {
    message: 'max_tokens and effort are mutually exclusive',
  });

export const CanonicalRequestSchema = z
  .object({
    messages: z.array(MessageSchema).min(1),
    model_id: z.string().min(1),
    timeout: TimeoutSchema.optional(),
    stream_idle_timeout: positiveSeconds.optional(),
    max_retries: z.number().int().nonnegative().optional(),
    allow_list: z.array(z.string().min(1)).optional(),
    ignore_list: z.array(z.string().min(1)).optional(),
    transport: z.enum(['default', 'stream']).optional(),
    reasoning: ReasoningSchema.optional(),
    max_tokens: z.number().int().positive().optional(),
    temperature: z.number().optional(),
    top_p: z.number().optional(),
    stop: z.union([z.string(), z.array(z.string())]).optional(),
    seed: z.number().int().optional(),
    stream: z.boolean().optional(),
  })
  .superRefine((request, ctx) => {
    if (request.stream && request.transport !== 'stream') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['stream'],
        message: "Direct stream=true is not supported. Use transport='stream' to get an aggregated streamed response.",
      });
    }
    if (request.allow_list?.length && request.ignore_list?.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['allow_list'],
        message: 'allow_list and ignore_list are mutually exclusive',
      });
    }
  });

// =============================================================================
// Validation
// =============================================================================

function describeIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

/**
 * Check a request's option contract.
 *
 * @returns the violation, or undefined when the request is well-formed
 */
export function validateRequest(request: CanonicalRequest, provider?: string): InvalidOptionError | undefined {
  const result = CanonicalRequestSchema.safeParse(request);
  if (result.success) return undefined;
  return new InvalidOptionError(result.error.issues.map(describeIssue).join('; '), provider);
}
