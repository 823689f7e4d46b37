import crypto from 'crypto';
import type { PromptOverflowPolicy } from '../config';
import type { AspectRatio } from '../types';
import { templates } from './templates';

export interface PromptLengthPolicy {
  maxLength: number;
  overflowPolicy: PromptOverflowPolicy;
}

export type PromptPolicyResult = { ok: true; prompt: string } | { ok: false; reason: string };

export function normalizePrompt(input: string): string {
  return (input ?? '').replace(/\r\n?/g, '\n').replace(/[ \t]+/g, ' ').trim();
}

/**
 * Checks emptiness and length on the normalized text, but hands back the
 * caller's own text: unchanged, or under `truncate` cut to `maxLength`.
 */
export function applyPromptLengthPolicy(input: string, policy: PromptLengthPolicy): PromptPolicyResult {
  const normalized = normalizePrompt(input);
  if (!normalized) return { ok: false, reason: 'Prompt must not be empty.' };
  if (normalized.length <= policy.maxLength) return { ok: true, prompt: input };

  if (policy.overflowPolicy === 'reject') {
    return { ok: false, reason: `Prompt is too long (max ${policy.maxLength} characters).` };
  }
  return { ok: true, prompt: input.slice(0, policy.maxLength) };
}

export function buildEnhancementInstruction(prompt: string, aspectRatio: AspectRatio): string {
  const guidelines = [...templates.guidelines, templates.framing[aspectRatio], ...templates.safety]
    .map((line, i) => `${i + 1}. ${line}`)
    .join('\n');

  return [
    templates.role,
    '',
    templates.task,
    '',
    'Guidelines:',
    guidelines,
    '',
    templates.output,
    '',
    `Original prompt: ${prompt}`,
    '',
    'Enhanced prompt:',
  ].join('\n');
}

// Models sometimes echo the label or wrap the answer in quotes.
export function cleanEnhancedText(text: string | undefined | null): string {
  let out = String(text ?? '').trim();
  out = out.replace(/^(\*\*)?enhanced prompt(\*\*)?\s*:\s*/i, '');
  out = out.replace(/^["'“”]+|["'“”]+$/g, '');
  return out.replace(/\s+/g, ' ').trim();
}

export function hashShort(s: string): string {
  return crypto.createHash('sha256').update(s).digest('hex').slice(0, 12);
}
