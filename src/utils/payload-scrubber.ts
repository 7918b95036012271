/**
 * Redacts credentials and trims long strings in job params before they are
 * logged. Prompts and captions stay readable up to `maxStringLength`.
 */

const CREDENTIAL_KEY_PATTERNS = [
  /^(api[_-]?key|apikey)$/i,
  /^(secret|password|passwd|pwd)$/i,
  /^(auth|authorization|bearer)$/i,
  /^(access[_-]?token|refresh[_-]?token|token)$/i,
  /^(credentials?|creds?)$/i,
  /(key|secret|password|token|credential)/i,
];

const CREDENTIAL_VALUE_PATTERNS = [
  /^sk-[a-zA-Z0-9_-]+$/,
  /^Bearer\s+/i,
  /^[a-f0-9]{32,}$/i,
  /^[A-Za-z0-9+/]{40,}={0,2}$/,
];

const DATA_URL = /^data:([\w/+.-]+);base64,/;

export const REDACTED = '[REDACTED]';

export interface ScrubOptions {
  maxDepth?: number;
  maxStringLength?: number;
}

export function isCredentialKey(key: string): boolean {
  return CREDENTIAL_KEY_PATTERNS.some(pattern => pattern.test(key));
}

export function isCredentialValue(value: string): boolean {
  return CREDENTIAL_VALUE_PATTERNS.some(pattern => pattern.test(value));
}

export function scrubParams(params: unknown, options: ScrubOptions = {}): unknown {
  const { maxDepth = 6, maxStringLength = 200 } = options;

  const scrubString = (value: string): string => {
    const dataUrl = DATA_URL.exec(value);
    if (dataUrl) return `[${dataUrl[1]} data URL, ${value.length} chars]`;
    if (isCredentialValue(value)) return REDACTED;
    if (value.length > maxStringLength) {
      return `${value.slice(0, maxStringLength)}... (+${value.length - maxStringLength} chars)`;
    }
    return value;
  };

  const visit = (value: unknown, depth: number): unknown => {
    if (typeof value === 'string') return scrubString(value);
    if (value === null || typeof value !== 'object') return value;
    if (depth >= maxDepth) return '[MAX_DEPTH_EXCEEDED]';

    if (Array.isArray(value)) {
      return value.map(item => visit(item, depth + 1));
    }

    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = isCredentialKey(key) ? REDACTED : visit(entry, depth + 1);
    }
    return result;
  };

  return visit(params, 0);
}

/** Log-ready form: the scrubbed params plus their serialized size. */
export function loggableParams(params: unknown, options?: ScrubOptions): { preview: unknown; bytes: number } {
  return {
    preview: scrubParams(params, options),
    bytes: Buffer.byteLength(JSON.stringify(params) ?? '', 'utf8'),
  };
}
