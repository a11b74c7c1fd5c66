/**
 * Sensitive Data Redaction
 *
 * Field-name and value-pattern redaction applied to every log entry's metadata.
 * Trial arguments and experiment metadata are free-form and routinely carry
 * credentials or customer identifiers, so nothing reaches a log handler unfiltered.
 */

const SENSITIVE_FIELD_PATTERNS: readonly RegExp[] = [
  /^password$/i,
  /^passwd$/i,
  /^secret$/i,
  /^token$/i,
  /^api[_-]?key$/i,
  /^auth[_-]?token$/i,
  /^access[_-]?token$/i,
  /^refresh[_-]?token$/i,
  /^private[_-]?key$/i,
  /^client[_-]?secret$/i,
  /^session[_-]?id$/i,
  /^authorization$/i,
  /^cookie$/i,
  /^credit[_-]?card$/i,
  /_key$/i,
  /_secret$/i,
  /_token$/i,
  /_password$/i,
];

const SENSITIVE_VALUE_PATTERNS: readonly RegExp[] = [
  /^[a-zA-Z0-9_-]+\.eyJ/,          // JWT
  /^Bearer\s+[a-zA-Z0-9._-]+/,     // Bearer token
  /^Basic\s+[a-zA-Z0-9=]+$/,       // Basic auth
  /^sk_(live|test)_[a-zA-Z0-9]{16,}$/,
  /^-----BEGIN (RSA |EC |OPENSSH )?PRIVATE KEY-----/,
  /^(redis|rediss|postgres|postgresql):\/\/[^:@]+:[^@]+@/i,
];

/** Default nesting limit for {@link sanitizeForLogging} */
const DEFAULT_MAX_DEPTH = 8;

export function isSensitiveField(fieldName: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some(pattern => pattern.test(fieldName));
}

export function isSensitiveValue(value: unknown): boolean {
  if (typeof value !== 'string') {
    return false;
  }
  return SENSITIVE_VALUE_PATTERNS.some(pattern => pattern.test(value));
}

/**
 * Mask a value, keeping the first and last two characters
 */
export function maskValue(value: string): string {
  if (value.length <= 8) {
    return '****';
  }
  return `${value.slice(0, 2)}****${value.slice(-2)}`;
}

/** Output of {@link sanitizeForLogging} */
export type SanitizedData =
  | string
  | number
  | boolean
  | null
  | undefined
  | SanitizedData[]
  | { [key: string]: SanitizedData };

export interface SanitizeOptions {
  /** Keys replaced with `[REDACTED]` in addition to the built-in patterns */
  redactKeys?: readonly string[];
  maxDepth?: number;
}

/**
 * Recursively sanitize a value for logging.
 *
 * Errors collapse to `{ name, message }`, dates to ISO strings and functions
 * to `[Function]`. Circular references are reported rather than followed.
 */
export function sanitizeForLogging(data: unknown, options: SanitizeOptions = {}): SanitizedData {
  return sanitizeValue(data, options, 0, new WeakSet<object>());
}

function sanitizeValue(
  data: unknown,
  options: SanitizeOptions,
  depth: number,
  seen: WeakSet<object>
): SanitizedData {
  if (depth > (options.maxDepth ?? DEFAULT_MAX_DEPTH)) {
    return '[Max Depth Exceeded]';
  }

  if (data === null || data === undefined) {
    return data;
  }

  switch (typeof data) {
    case 'string':
      return isSensitiveValue(data) ? maskValue(data) : data;
    case 'number':
    case 'boolean':
      return data;
    case 'bigint':
      return data.toString();
    case 'function':
      return '[Function]';
    case 'symbol':
      return '[Symbol]';
    default:
      break;
  }

  if (typeof data !== 'object') {
    return String(data);
  }

  if (data instanceof Date) {
    return data.toISOString();
  }

  if (data instanceof Error) {
    return { name: data.name, message: data.message };
  }

  if (seen.has(data)) {
    return '[Circular]';
  }
  seen.add(data);

  try {
    if (Array.isArray(data) || data instanceof Set) {
      return [...data].map(item => sanitizeValue(item, options, depth + 1, seen));
    }

    const entries: Iterable<[unknown, unknown]> = data instanceof Map ? data.entries() : Object.entries(data);
    const redactKeys = options.redactKeys ?? [];
    const sanitized: Record<string, SanitizedData> = {};
    for (const [rawKey, value] of entries) {
      const key = String(rawKey);
      sanitized[key] = isSensitiveField(key) || redactKeys.includes(key)
        ? '[REDACTED]'
        : sanitizeValue(value, options, depth + 1, seen);
    }
    return sanitized;
  } finally {
    // Only ancestors count as cycles; shared siblings are sanitized again
    seen.delete(data);
  }
}

/**
 * Strip credentials from an error message before it is logged or surfaced
 */
export function sanitizeErrorMessage(error: unknown): string {
  if (error === null || error === undefined) {
    return 'Unknown error';
  }

  let message = error instanceof Error ? error.message : String(error);

  const patterns: ReadonlyArray<{ pattern: RegExp; replacement: string }> = [
    { pattern: /eyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g, replacement: '[JWT]' },
    { pattern: /Bearer\s+[a-zA-Z0-9._-]+/gi, replacement: 'Bearer ***' },
    { pattern: /(redis|rediss|postgres|postgresql):\/\/[^:@\s]+:[^@\s]+@/gi, replacement: '$1://***:***@' },
    { pattern: /password['"]?\s*[:=]\s*['"]?[^\s'"]+/gi, replacement: 'password=***' },
  ];

  for (const { pattern, replacement } of patterns) {
    message = message.replace(pattern, replacement);
  }

  return message;
}
