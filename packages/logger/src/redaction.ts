/**
 * Secret Redaction
 *
 * Property names whose values never reach log output. Configuration objects
 * carry provider credentials, so both the top level and one level of nesting
 * are covered (e.g. `config.cohere.apiKey` logged as `cohere`).
 */

const SENSITIVE_KEYS = [
  "apiKey",
  "api_key",
  "token",
  "secret",
  "password",
  "authorization",
  "cookie",
] as const;

export const REDACT_PATHS: string[] = [
  ...SENSITIVE_KEYS,
  ...SENSITIVE_KEYS.map((key) => `*.${key}`),
];

export const REDACTED = "[REDACTED]";
