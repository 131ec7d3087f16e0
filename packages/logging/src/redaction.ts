const DEFAULT_SENSITIVE_SUBSTRINGS = [
  'token',
  'secret',
  'password',
  'passphrase',
  'authorization',
  'cookie',
  'privatekey',
  'private_key',
  'pkcs8',
  'body'
] as const;

const REDACTED_VALUE = '[REDACTED]';
const MAX_RECURSION_DEPTH = 12;
// key material can hide under any key name, e.g. inside a stored configuration
const PRIVATE_KEY_PEM_PATTERN = /-----BEGIN [A-Z ]*PRIVATE KEY-----/u;

const normalizeKey = (value: string) => value.trim().toLowerCase().replace(/[^a-z0-9_]/gu, '');

const isSensitiveKey = ({key, extraSensitiveKeys}: {key: string; extraSensitiveKeys: Set<string>}) => {
  const normalized = normalizeKey(key);
  if (extraSensitiveKeys.has(normalized)) {
    return true;
  }

  return DEFAULT_SENSITIVE_SUBSTRINGS.some(entry => normalized.includes(entry));
};

const sanitizeErrorForLog = (error: Error) => ({
  name: error.name,
  message: error.message,
  ...(error.stack ? {stack: error.stack} : {})
});

const sanitizeInternal = ({
  value,
  depth,
  seen,
  extraSensitiveKeys
}: {
  value: unknown;
  depth: number;
  seen: WeakSet<object>;
  extraSensitiveKeys: Set<string>;
}): unknown => {
  if (depth > MAX_RECURSION_DEPTH) {
    return '[TRUNCATED]';
  }

  if (value === null || value === undefined) {
    return value;
  }

  if (typeof value === 'string') {
    return PRIVATE_KEY_PEM_PATTERN.test(value) ? REDACTED_VALUE : value;
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'bigint') {
    return value.toString();
  }

  if (typeof value === 'symbol') {
    return value.toString();
  }

  if (typeof value === 'function') {
    return '[FUNCTION]';
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? '[INVALID_DATE]' : value.toISOString();
  }

  if (value instanceof Error) {
    return sanitizeErrorForLog(value);
  }

  // certificate and key material is never written out
  if (value instanceof Uint8Array || value instanceof ArrayBuffer) {
    return `[BYTES:${value.byteLength}]`;
  }

  if (Array.isArray(value)) {
    return value.map(item =>
      sanitizeInternal({
        value: item,
        depth: depth + 1,
        seen,
        extraSensitiveKeys
      })
    );
  }

  if (typeof value !== 'object') {
    return Object.prototype.toString.call(value);
  }

  if (seen.has(value)) {
    return '[CIRCULAR]';
  }

  seen.add(value);

  const nextEntries = Object.entries(value).map(([key, entryValue]) => {
    if (isSensitiveKey({key, extraSensitiveKeys})) {
      return [key, REDACTED_VALUE] as const;
    }

    return [
      key,
      sanitizeInternal({
        value: entryValue,
        depth: depth + 1,
        seen,
        extraSensitiveKeys
      })
    ] as const;
  });

  return Object.fromEntries(nextEntries);
};

export const sanitizeForLog = ({
  value,
  extraSensitiveKeys = []
}: {
  value: unknown;
  extraSensitiveKeys?: string[];
}): unknown => {
  const normalizedExtraKeys = new Set(extraSensitiveKeys.map(item => normalizeKey(item)).filter(item => item.length > 0));

  return sanitizeInternal({
    value,
    depth: 0,
    seen: new WeakSet<object>(),
    extraSensitiveKeys: normalizedExtraKeys
  });
};
