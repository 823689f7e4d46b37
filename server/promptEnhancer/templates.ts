import type { AspectRatio } from '../types';

export const templates = {
  role: 'You are an expert in writing prompts for AI video generation models.',
  task: 'Rewrite the given prompt into a richer, visually descriptive prompt for a short generated video.',
  guidelines: [
    'Keep the subject, action and intent of the original prompt; do not add unrelated subjects.',
    'Describe concrete visuals: setting, characters, colors, lighting and textures.',
    'Describe movement and camera: slow, smooth motion that is easy to follow.',
    'Keep it focused on one scene or concept.',
    'If on-screen text is requested, keep it large, clear and shown one element at a time.',
    'Use plain, specific language; avoid vague quality words.',
  ],
  framing: {
    '16:9': 'Compose for a wide 16:9 landscape frame: spread the action horizontally and use the full width.',
    '9:16': 'Compose for a tall 9:16 portrait frame: center the subject and stack the action vertically.',
    '1:1': 'Compose for a square 1:1 frame: keep the subject centered with balanced margins.',
    '4:3': 'Compose for a 4:3 frame: keep the subject near the center with moderate headroom.',
  } satisfies Record<AspectRatio, string>,
  safety: [
    'Content must be safe for a general audience: no violence, gore, nudity or hateful imagery.',
    'Do not depict real, identifiable people or trademarked logos.',
  ],
  output: 'Return ONLY the enhanced prompt as a single paragraph. No explanations, no headings, no meta-commentary.',
} as const;

export const GENERATION_PARAMS = {
  temperature: 0.7,
  topP: 0.9,
  maxOutputTokens: 500,
} as const;
