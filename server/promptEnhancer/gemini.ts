import { GoogleGenAI } from '@google/genai';
import { GENERATION_PARAMS } from './templates';

export interface TextModel {
  generateText(prompt: string, signal: AbortSignal): Promise<string>;
}

export function createGeminiTextModel(args: { apiKey: string; model: string }): TextModel {
  const ai = new GoogleGenAI({ apiKey: args.apiKey });

  return {
    async generateText(prompt, signal) {
      const result = await ai.models.generateContent({
        model: args.model,
        contents: prompt,
        config: { ...GENERATION_PARAMS, abortSignal: signal },
      });
      return result.text ?? '';
    },
  };
}
