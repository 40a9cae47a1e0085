const REDACTIONS: Array<[RegExp, string]> = [
  [/(bot|discord|token|secret)=([A-Za-z0-9._-]+)/gi, '$1=***'],
  [/Authorization:\s*Bot\s+[A-Za-z0-9._-]+/gi, 'Authorization: Bot ***'],
];

export function redact(s: string): string {
  let out = s;
  for (const [re, replacement] of REDACTIONS) out = out.replace(re, replacement);
  return out;
}

export function normalizeError(err: unknown) {
  if (err instanceof Error) {
    return {
      name: err.name || 'Error',
      message: redact(err.message || 'unknown'),
      stack: redact(err.stack || ''),
    };
  }
  return {
    name: typeof err,
    message: redact(String(err)),
    stack: '',
  };
}

export function buildErrorId(): string {
  // tiny, non-crypto id for correlating logs ↔ user reply
  return Math.random().toString(36).slice(2, 10);
}
