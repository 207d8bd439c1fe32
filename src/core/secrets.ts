const MASK = '***';

const registered = new Set<string>();

/** Register a value that must never appear in clear in logs or error output. */
export function registerSecret(value: string): void {
  if (value.length > 0) {
    registered.add(value);
  }
}

export function clearSecrets(): void {
  registered.clear();
}

export function maskSecrets(message: string): string {
  // longest first so a secret containing another is replaced whole
  const secrets = [...registered].sort((a, b) => b.length - a.length);
  let masked = message;
  for (const secret of secrets) {
    masked = masked.split(secret).join(MASK);
  }
  return masked;
}
