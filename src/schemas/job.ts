import { z } from 'zod';
import { FONT_STYLE_NAMES } from '../media/fonts.js';

export const JobStateSchema = z.enum(['queued', 'running', 'succeeded', 'failed', 'expired']);

export const JobKindSchema = z.enum(['promo-video', 'image-to-video', 'text-to-image', 'split-screen']);

export const JobErrorSchema = z.object({
  type: z.enum(['ValidationError', 'TransientInfraError', 'TransientUpstreamError', 'PermanentJobError', 'ExpiredError']),
  code: z.string(),
  message: z.string(),
  retryable: z.boolean(),
  attempt: z.number().int(),
  step: z.string().optional(),
  occurredAt: z.string(),
});

// Per-kind params. Field names are the wire names.

export const PromoVideoParamsSchema = z.object({
  text: z.string().trim().min(1).max(500),
  font_style: z.enum(FONT_STYLE_NAMES).default('poppins'),
  text_position: z.enum(['top', 'center', 'bottom']).default('center'),
  bgm_volume: z.number().min(0).max(1).default(0.3),
});

export const ImageToVideoParamsSchema = z.object({
  prompt: z.string().trim().min(1).max(2000).optional(),
  model: z.string().min(1).default('I2V-01-Director'),
});

export const TextToImageParamsSchema = z.object({
  prompt: z.string().trim().min(1).max(2000),
  model: z.enum(['juggernaut-pro-flux', 'gpt-image-1']).default('juggernaut-pro-flux'),
  seed: z.number().int().min(0).optional(),
});

export const SplitScreenParamsSchema = z.object({
  primary_position: z.enum(['top', 'bottom']).default('top'),
});

const InputRefSchema = z.string().trim().min(1).max(2048);
const MaxAttemptsSchema = z.number().int().min(1).max(10).optional();

export const CreateJobSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('promo-video'),
    // avatar clip, demo clip, optional background music
    input_refs: z.array(InputRefSchema).min(2).max(3),
    params: PromoVideoParamsSchema,
    max_attempts: MaxAttemptsSchema,
  }),
  z.object({
    kind: z.literal('image-to-video'),
    input_refs: z.array(InputRefSchema).length(1),
    params: ImageToVideoParamsSchema.default({}),
    max_attempts: MaxAttemptsSchema,
  }),
  z.object({
    kind: z.literal('text-to-image'),
    input_refs: z.array(InputRefSchema).max(0).default([]),
    params: TextToImageParamsSchema,
    max_attempts: MaxAttemptsSchema,
  }),
  z.object({
    kind: z.literal('split-screen'),
    // primary clip, looping secondary clip
    input_refs: z.array(InputRefSchema).length(2),
    params: SplitScreenParamsSchema.default({}),
    max_attempts: MaxAttemptsSchema,
  }),
]);

export const JobParamsSchema = z.object({
  jobId: z.string().min(1).max(64),
});

export const IdempotencyKeySchema = z.string().trim().min(1).max(255);

export type CreateJobRequest = z.infer<typeof CreateJobSchema>;
export type PromoVideoParams = z.infer<typeof PromoVideoParamsSchema>;
export type ImageToVideoParams = z.infer<typeof ImageToVideoParamsSchema>;
export type TextToImageParams = z.infer<typeof TextToImageParamsSchema>;
export type SplitScreenParams = z.infer<typeof SplitScreenParamsSchema>;
export type JobParams = z.infer<typeof JobParamsSchema>;
