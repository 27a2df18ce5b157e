const SENSITIVE_KEYS = /^(authorization|password|secret|token|api[_-]?key|credential|access[_-]?token|refresh[_-]?token|client[_-]?secret)$/i;

// Credentials the model CLIs are known to echo into stderr or error envelopes.
const SENSITIVE_VALUES = [
  /AIza[A-Za-z0-9_-]{35}/g,
  /ya29\.[A-Za-z0-9_-]+/g,
  /sk-(?:proj-|ant-)?[A-Za-z0-9_-]{20,}/g,
  /Bearer\s+[A-Za-z0-9_.\-\/+=]{20,}/g,
  /eyJ[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,}/g,
];

export function redactText(text: string): string {
  let result = text;
  for (const pattern of SENSITIVE_VALUES) {
    result = result.replace(pattern, "[REDACTED]");
  }
  return result;
}

export function redactPayload<T>(value: T): T;
export function redactPayload(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === "string") return redactText(value);
  if (typeof value !== "object") return value;
  if (Array.isArray(value)) return value.map((item: unknown) => redactPayload(item));
  const result: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    result[k] = SENSITIVE_KEYS.test(k) && typeof v === "string" ? "[REDACTED]" : redactPayload(v);
  }
  return result;
}
