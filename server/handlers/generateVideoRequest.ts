import { z } from 'zod';
import { ASPECT_RATIOS, type GenerationRequest } from '../types';

const bodySchema = z.object({
  // Checked for content but passed on as sent: spacing can be part of the prompt.
  prompt: z.string({ required_error: 'Prompt is required.' }).refine((v) => v.trim().length > 0, 'Prompt must not be empty.'),
  aspect_ratio: z.enum(ASPECT_RATIOS).default('16:9'),
  enhance_prompt: z.boolean().default(true),
});

export type ParsedBody<T> = { ok: true; value: T } | { ok: false; error: string };

export function parseGenerateVideoBody(body: unknown): ParsedBody<GenerationRequest> {
  const parsed = bodySchema.safeParse(body ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || 'body';
    return { ok: false, error: `${field}: ${issue?.message ?? 'Invalid request.'}` };
  }
  return {
    ok: true,
    value: {
      rawPrompt: parsed.data.prompt,
      aspectRatio: parsed.data.aspect_ratio,
      enhance: parsed.data.enhance_prompt,
    },
  };
}
