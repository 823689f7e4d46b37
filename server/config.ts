import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';

export type PromptOverflowPolicy = 'reject' | 'truncate';

export interface CloudinaryCredentials {
  readonly cloudName: string;
  readonly apiKey: string;
  readonly apiSecret: string;
}

export interface ServerConfig {
  readonly port: number;
  readonly clientOrigins: readonly string[];
  readonly gemini: {
    readonly apiKey: string;
    readonly textModel: string;
    readonly videoModel: string;
    readonly apiBaseUrl: string;
  };
  // Absent credentials mean local-only storage, not a misconfiguration.
  readonly cloudinary: CloudinaryCredentials | null;
  readonly storage: {
    readonly folder: string;
    readonly localDir: string;
    readonly filenamePrefix: string;
    readonly uploadRetryDelayMs: number;
    readonly downloadTimeoutMs: number;
  };
  readonly polling: {
    readonly intervalMs: number;
    readonly deadlineMs: number;
    readonly maxConsecutiveErrors: number;
  };
  readonly enhancer: {
    readonly enabled: boolean;
    readonly timeoutMs: number;
  };
  readonly prompt: {
    readonly maxLength: number;
    readonly overflowPolicy: PromptOverflowPolicy;
  };
  readonly remoteRequestTimeoutMs: number;
}

export const FOLDER_PATTERN = /^[A-Za-z0-9_-]+(\/[A-Za-z0-9_-]+)*$/;

const optionalText = z
  .string()
  .optional()
  .transform((v) => sanitizeKey(v) || undefined);

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const TRUTHY = ['true', '1', 'yes', 'on'];
const FALSY = ['false', '0', 'no', 'off'];

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((v) => v?.trim().toLowerCase() ?? '')
    .refine((v) => !v || TRUTHY.includes(v) || FALSY.includes(v), {
      message: `Expected one of ${[...TRUTHY, ...FALSY].join(', ')}`,
    })
    .transform((v) => (v ? TRUTHY.includes(v) : fallback));

const schema = z
  .object({
    PORT: positiveInt(8000),
    CLIENT_ORIGIN: z.string().default(''),
    GEMINI_API_KEY: optionalText,
    GOOGLE_API_KEY: optionalText,
    TEXT_MODEL: z.string().min(1).default('gemini-2.5-flash'),
    VEO_MODEL: z.string().min(1).default('veo-3.1-generate-preview'),
    GEMINI_API_BASE_URL: z.string().url().default('https://generativelanguage.googleapis.com'),
    CLOUDINARY_CLOUD_NAME: optionalText,
    CLOUDINARY_API_KEY: optionalText,
    CLOUDINARY_API_SECRET: optionalText,
    STORAGE_FOLDER: z.string().regex(FOLDER_PATTERN, 'Invalid storage folder').default('generated-videos'),
    LOCAL_STORAGE_DIR: z.string().min(1).default('output'),
    FILENAME_PREFIX: z
      .string()
      .regex(/^[A-Za-z0-9-]+(_[A-Za-z0-9-]+)*$/, 'Invalid filename prefix')
      .default('video'),
    POLL_INTERVAL_MS: positiveInt(5000),
    POLL_DEADLINE_MS: positiveInt(600_000),
    POLL_MAX_CONSECUTIVE_ERRORS: positiveInt(3),
    ENHANCEMENT_TIMEOUT_MS: positiveInt(10_000),
    REMOTE_REQUEST_TIMEOUT_MS: positiveInt(30_000),
    DOWNLOAD_TIMEOUT_MS: positiveInt(300_000),
    UPLOAD_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(2000),
    PROMPT_MAX_LENGTH: positiveInt(2000),
    PROMPT_OVERFLOW_POLICY: z.enum(['reject', 'truncate']).default('reject'),
    PROMPT_ENHANCER_ENABLED: flag(true),
  })
  .superRefine((env, ctx) => {
    if (!env.GEMINI_API_KEY && !env.GOOGLE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['GEMINI_API_KEY'],
        message: 'API key not found. Set GEMINI_API_KEY or GOOGLE_API_KEY.',
      });
    }
    const cloudinaryKeys = [env.CLOUDINARY_CLOUD_NAME, env.CLOUDINARY_API_KEY, env.CLOUDINARY_API_SECRET];
    const present = cloudinaryKeys.filter(Boolean).length;
    if (present > 0 && present < cloudinaryKeys.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CLOUDINARY_CLOUD_NAME'],
        message:
          'Partial Cloudinary credentials. Set all of CLOUDINARY_CLOUD_NAME, CLOUDINARY_API_KEY and CLOUDINARY_API_SECRET, or none.',
      });
    }
  });

export function sanitizeKey(v?: string) {
  return (v ?? '')
    .trim()
    .replace(/\r?\n/g, '')
    .replace(/^"(.*)"$/, '$1')
    .replace(/^'(.*)'$/, '$1');
}

export function maskKey(key: string) {
  return key.length >= 8 ? `${key.slice(0, 4)}...${key.slice(-4)}` : '(too short)';
}

export function readServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'env'}: ${i.message}`);
    throw new Error(`Invalid configuration. ${issues.join('; ')}`);
  }
  const e = parsed.data;

  const cloudinary =
    e.CLOUDINARY_CLOUD_NAME && e.CLOUDINARY_API_KEY && e.CLOUDINARY_API_SECRET
      ? { cloudName: e.CLOUDINARY_CLOUD_NAME, apiKey: e.CLOUDINARY_API_KEY, apiSecret: e.CLOUDINARY_API_SECRET }
      : null;

  const config: ServerConfig = {
    port: e.PORT,
    clientOrigins: e.CLIENT_ORIGIN.split(',')
      .map((origin) => origin.trim().replace(/\/+$/, ''))
      .filter(Boolean),
    gemini: {
      apiKey: e.GEMINI_API_KEY ?? e.GOOGLE_API_KEY ?? '',
      textModel: e.TEXT_MODEL,
      videoModel: e.VEO_MODEL,
      apiBaseUrl: e.GEMINI_API_BASE_URL.replace(/\/+$/, ''),
    },
    cloudinary,
    storage: {
      folder: e.STORAGE_FOLDER,
      localDir: path.resolve(process.cwd(), e.LOCAL_STORAGE_DIR),
      filenamePrefix: e.FILENAME_PREFIX,
      uploadRetryDelayMs: e.UPLOAD_RETRY_DELAY_MS,
      downloadTimeoutMs: e.DOWNLOAD_TIMEOUT_MS,
    },
    polling: {
      intervalMs: e.POLL_INTERVAL_MS,
      deadlineMs: e.POLL_DEADLINE_MS,
      maxConsecutiveErrors: e.POLL_MAX_CONSECUTIVE_ERRORS,
    },
    enhancer: {
      enabled: e.PROMPT_ENHANCER_ENABLED,
      timeoutMs: e.ENHANCEMENT_TIMEOUT_MS,
    },
    prompt: {
      maxLength: e.PROMPT_MAX_LENGTH,
      overflowPolicy: e.PROMPT_OVERFLOW_POLICY,
    },
    remoteRequestTimeoutMs: e.REMOTE_REQUEST_TIMEOUT_MS,
  };

  return deepFreeze(config);
}

export function loadEnvFiles(cwd = process.cwd()) {
  const rootEnv = path.resolve(cwd, '.env');
  const serverEnv = path.resolve(cwd, 'server', '.env');

  if (fs.existsSync(rootEnv)) dotenv.config({ path: rootEnv });
  if (fs.existsSync(serverEnv)) dotenv.config({ path: serverEnv });

  return { loadedRootEnv: fs.existsSync(rootEnv), loadedServerEnv: fs.existsSync(serverEnv) };
}

function deepFreeze<T extends object>(value: T): T {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) deepFreeze(child);
  }
  return Object.freeze(value);
}
