/**
 * Redaction of credentials that external tools echo back: compose files rendered by
 * `docker compose config`, registry URLs in npm/pip output, tokens in build logs.
 */

const MAX_REDACTION_LENGTH = 50000;

export const SECRET_PATTERNS = [
  /\bBearer\s+[A-Za-z0-9._-]{10,10000}\b/gi,
  /\bBasic\s+[A-Za-z0-9+/=]{10,10000}/gi,
  /-----BEGIN [A-Z]+(?: [A-Z]+)*-----[\s\S]{0,10000}?-----END [A-Z]+(?: [A-Z]+)*-----/g,
  /\bAKIA[0-9A-Z]{16}\b/g,
  /\bgh[pousr]_[0-9a-zA-Z]{32,255}\b/g,
  /\bnpm_[0-9a-zA-Z]{36}\b/g,
  /\bpypi-[0-9a-zA-Z_-]{50,255}\b/g,
  /\b(?:Proxy-)?Authorization:\s*[^\r\n]{1,10000}/gi,
  /\bxox[baprs]-[0-9a-zA-Z-]{10,48}\b/g,
];

// KEY=value and `key: value` assignments whose name marks a credential.
export const ASSIGNMENT_PATTERN =
  /\b([A-Za-z0-9_]*(?:PASSWORD|PASSWD|SECRET|TOKEN|API_KEY)[A-Za-z0-9_]*)(\s*[:=]\s*)(?!\$\{)(["']?)[^\s"']{1,1000}\3/gi;

export const URL_CRED_PATTERN = /\/\/[^/:@\s]{1,256}:[^/@\s]{1,256}@/g;

export const SENSITIVE_NAMES = [
  /PASS(WOR)?D$/i,
  /PRIVATE_KEY$/i,
  /CLIENT_SECRET$/i,
  /AUTH/i,
  /CREDENTIAL/i,
  /(^|_)KEY$/i,
  /API_KEY$/i,
  /TOKEN$/i,
  /SECRET$/i,
  /DATABASE_URL$/i,
];

export function safeTruncate(text: string): string {
  if (text.length <= MAX_REDACTION_LENGTH) {
    return text;
  }
  return text.slice(0, MAX_REDACTION_LENGTH) + "\n[... truncated]";
}

export function redactText(text: string): string {
  let redacted = safeTruncate(text);
  for (const pattern of SECRET_PATTERNS) {
    redacted = redacted.replace(pattern, "[REDACTED]");
  }
  redacted = redacted.replace(ASSIGNMENT_PATTERN, "$1$2[REDACTED]");
  redacted = redacted.replace(URL_CRED_PATTERN, "//[REDACTED]@");
  return redacted;
}

/**
 * Recursively redacts string leaves, and every value stored under a sensitive key.
 */
export function redactObject<T>(obj: T): T {
  if (typeof obj === "string") {
    return redactText(obj) as unknown as T;
  }

  if (Array.isArray(obj)) {
    return obj.map(redactObject) as unknown as T;
  }

  if (obj && typeof obj === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (SENSITIVE_NAMES.some((pattern) => pattern.test(key))) {
        result[key] = "[REDACTED]";
      } else {
        result[key] = redactObject(value);
      }
    }
    return result as unknown as T;
  }

  return obj;
}
