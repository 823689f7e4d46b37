import { errorMessage, mapGeminiError } from '../errors';
import type { AspectRatio, EnhancedPrompt } from '../types';
import { withTimeout } from '../utils/async';
import {
  applyPromptLengthPolicy,
  buildEnhancementInstruction,
  cleanEnhancedText,
  hashShort,
  type PromptLengthPolicy,
} from './enhance';
import type { TextModel } from './gemini';

export interface EnhancementClient {
  /** Never rejects: any remote failure degrades to the raw prompt. */
  enhance(rawPrompt: string, aspectRatio: AspectRatio): Promise<EnhancedPrompt>;
}

export interface EnhancementClientOptions {
  textModel: TextModel;
  timeoutMs: number;
  enabled: boolean;
  lengthPolicy: PromptLengthPolicy;
}

export function passThrough(rawPrompt: string, usedFallback: boolean): EnhancedPrompt {
  return { original: rawPrompt, enhanced: rawPrompt, usedFallback };
}

export function createEnhancementClient(options: EnhancementClientOptions): EnhancementClient {
  const { textModel, timeoutMs, enabled, lengthPolicy } = options;

  return {
    async enhance(rawPrompt, aspectRatio) {
      if (!enabled) return passThrough(rawPrompt, false);

      const hash = hashShort(rawPrompt);
      const checked = applyPromptLengthPolicy(rawPrompt, lengthPolicy);
      if (!checked.ok) {
        console.warn('[Enhancer] prompt not eligible, using raw prompt', { hash, reason: checked.reason });
        return passThrough(rawPrompt, true);
      }

      const started = Date.now();
      try {
        // Single attempt: a retry would eat into the end-to-end budget.
        const text = await withTimeout(
          (signal) => textModel.generateText(buildEnhancementInstruction(checked.prompt, aspectRatio), signal),
          timeoutMs
        );
        const enhanced = cleanEnhancedText(text);
        if (!enhanced) throw new Error('Empty enhancement response');

        console.log('[Enhancer]', { hash, enhancedHash: hashShort(enhanced), ms: Date.now() - started });
        return { original: rawPrompt, enhanced, usedFallback: false };
      } catch (err) {
        console.warn('[Enhancer] enhancement failed, using raw prompt', {
          hash,
          reason: mapGeminiError(err),
          error: errorMessage(err),
          ms: Date.now() - started,
        });
        return passThrough(rawPrompt, true);
      }
    },
  };
}
