// ============ Log Sanitization ============

/** Patterns for sensitive data that should be redacted from logs */
const SENSITIVE_LOG_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
  // Provider keys
  { pattern: /sk-[a-zA-Z0-9_-]{16,}/g, replacement: 'sk-[REDACTED]' },
  { pattern: /AIza[a-zA-Z0-9_-]{20,}/g, replacement: 'AIza[REDACTED]' },
  // Tokens and keys
  { pattern: /bearer\s+[a-zA-Z0-9._-]+/gi, replacement: 'Bearer [REDACTED]' },
  { pattern: /token[=:]\s*[a-zA-Z0-9._-]+/gi, replacement: 'token=[REDACTED]' },
  { pattern: /api[_-]?key[=:]\s*[a-zA-Z0-9._-]+/gi, replacement: 'apiKey=[REDACTED]' },
  { pattern: /"api[_-]?key":\s*"[^"]+"/gi, replacement: '"apiKey": "[REDACTED]"' },
  { pattern: /password[=:]\s*[^\s,}\]]+/gi, replacement: 'password=[REDACTED]' },
  { pattern: /secret[=:]\s*[^\s,}\]]+/gi, replacement: 'secret=[REDACTED]' },
  // Authorization headers
  { pattern: /authorization[=:]\s*[^\s,}\]]+/gi, replacement: 'authorization=[REDACTED]' },
];

/**
 * Redact sensitive information from log messages.
 * Use this before logging any data that might contain credentials.
 */
export function redactForLogging(data: unknown): string {
  let text: string;

  if (typeof data === 'string') {
    text = data;
  } else if (data instanceof Error) {
    text = data.message;
  } else {
    try {
      text = JSON.stringify(data);
    } catch {
      text = String(data);
    }
  }

  for (const { pattern, replacement } of SENSITIVE_LOG_PATTERNS) {
    text = text.replace(pattern, replacement);
  }

  return text;
}

// ============ Error Sanitization ============

const MAX_ERROR_MESSAGE_LENGTH = 200;

/**
 * Reduce an error to a single redacted line for the terminal.
 * Full details, stack included, go to the logger instead.
 */
export function sanitizeErrorMessage(error: unknown): string {
  let message: string;

  if (error instanceof Error) {
    message = error.message;
  } else if (typeof error === 'string') {
    message = error;
  } else {
    return 'An unexpected error occurred';
  }

  message = redactForLogging(message);

  const firstLine = message.split('\n')[0];
  return firstLine.length > MAX_ERROR_MESSAGE_LENGTH
    ? firstLine.substring(0, MAX_ERROR_MESSAGE_LENGTH) + '...'
    : firstLine;
}
