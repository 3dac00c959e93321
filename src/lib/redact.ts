// Redaction helpers for settings values, URIs and messages shown to users

/** Stands in for any value that must not be printed. */
export const REDACTED_VALUE = '(redacted)';

const MAX_MESSAGE_LEN = 1000;

/** Masks the password part of a URI's userinfo: `postgres://u:pw@h/db` -> `postgres://u:(redacted)@h/db`. */
export function redactUri(uri: string): string {
  return uri.replace(/^([a-z][a-z0-9+.-]*:\/\/[^:/@\s]*):[^@/\s]*@/i, `$1:${REDACTED_VALUE}@`);
}

export function redactSecrets(text: string): string {
  if (!text) return text;

  let out = text;
  if (out.length > MAX_MESSAGE_LEN) {
    const tail = out.length - MAX_MESSAGE_LEN;
    out = out.slice(0, MAX_MESSAGE_LEN) + `\n[TRUNCATED ${tail} chars]`;
  }

  // "Bearer <token>"
  out = out.replace(/Bearer\s+[A-Za-z0-9\-._~+/]+=*/gi, 'Bearer [REDACTED]');

  // key=value and "key": "value" forms for secret-looking keys
  out = out.replace(
    /([a-zA-Z0-9_-]*?(?:api[_-]?key|secret|password|token)\b)\s*[:=]\s*(["']?)[A-Za-z0-9\-._~+/=]{8,}\2/gi,
    '$1: [REDACTED]',
  );

  // userinfo passwords inside URIs anywhere in the text
  out = out.replace(/(\b[a-z][a-z0-9+.-]*:\/\/[^:/@\s]*):[^@/\s]+@/gi, `$1:${REDACTED_VALUE}@`);

  return out;
}
