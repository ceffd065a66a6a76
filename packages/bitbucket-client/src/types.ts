/**
 * Wire types for the Bitbucket Cloud REST 2.0 pipelines API, plus the
 * client configuration schema.
 */

import { z } from 'zod';

const CredentialsSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('basic'), username: z.string().min(1), appPassword: z.string().min(1) }),
  z.object({ kind: z.literal('bearer'), token: z.string().min(1) })
]);

export const ConfigSchema = z.object({
  baseUrl: z.string().url(),
  timeout: z.number().int().positive().default(10_000),
  credentials: CredentialsSchema,
  pageLength: z.number().int().min(1).max(100).default(100),
  /** Pages followed per collection before the rest is dropped. */
  maxPages: z.number().int().positive().default(10)
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

// Bitbucket reports the outcome of a COMPLETED state in `result`.
const StateSchema = z.object({
  name: z.string(),
  result: z.object({ name: z.string() }).optional(),
  stage: z.object({ name: z.string() }).optional()
});

export type RawState = z.infer<typeof StateSchema>;

export const RawPipelineSchema = z.object({
  uuid: z.string(),
  build_number: z.number().int().default(0),
  repository: z.object({ full_name: z.string() }).optional(),
  state: StateSchema,
  target: z
    .object({
      ref_name: z.string().optional(),
      commit: z
        .object({
          hash: z.string(),
          message: z.string().optional(),
          date: z.string().datetime({ offset: true }).optional(),
          author: z
            .object({
              raw: z.string().optional(),
              display_name: z.string().optional(),
              user: z.object({ display_name: z.string().optional() }).optional()
            })
            .optional()
        })
        .optional(),
      selector: z
        .object({
          type: z.string().optional(),
          pattern: z.string().optional()
        })
        .optional()
    })
    .default({}),
  created_on: z.string().datetime({ offset: true }),
  completed_on: z.string().datetime({ offset: true }).nullish()
});

export type RawPipeline = z.infer<typeof RawPipelineSchema>;

export const RawStepSchema = z.object({
  uuid: z.string().optional(),
  name: z.string().default(''),
  state: StateSchema,
  started_on: z.string().datetime({ offset: true }).nullish(),
  completed_on: z.string().datetime({ offset: true }).nullish(),
  duration_in_seconds: z.number().nonnegative().nullish()
});

export type RawStep = z.infer<typeof RawStepSchema>;

export const RawVariableSchema = z.object({
  key: z.string(),
  // Bitbucket omits the value of secured variables.
  value: z.string().optional(),
  secured: z.boolean().default(false)
});

export type RawVariable = z.infer<typeof RawVariableSchema>;

export const pageOf = <T extends z.ZodTypeAny>(item: T) =>
  z.object({
    values: z.array(item).default([]),
    next: z.string().optional()
  });

export const BitbucketErrorSchema = z.object({
  error: z
    .object({
      message: z.string().optional(),
      detail: z.string().optional()
    })
    .optional()
});
