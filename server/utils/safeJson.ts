import { stripKeysDeep } from './stripKeysDeep';

// Transient remote references and credentials never leave the server.
export const LEAK_KEYS = ['resultRef', 'stagingPath', 'apiKey', 'apiSecret'] as const;

/** The slice of an express Response that safeJson writes to. */
export interface JsonResponse {
  status(code: number): JsonResponse;
  json(body: unknown): unknown;
}

export function safeJson(res: JsonResponse, payload: unknown, status?: number) {
  const sanitized = stripKeysDeep(payload, LEAK_KEYS);
  if (typeof status === 'number') {
    return res.status(status).json(sanitized);
  }
  return res.json(sanitized);
}
