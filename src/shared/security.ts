/**
 * Redaction of credentials from text that ends up in logs or error messages
 */

// Backend keys and bearer tokens as they may be echoed back in an error body
const SECRET_PATTERNS: RegExp[] = [/nvapi-[A-Za-z0-9_-]{20,}/g, /Bearer\s+[A-Za-z0-9._~+/-]{8,}=*/g];

function mask(secret: string): string {
  // Keep first and last 4 characters for identification
  if (secret.length <= 8) {
    return '*'.repeat(secret.length);
  }
  return `${secret.substring(0, 4)}****${secret.substring(secret.length - 4)}`;
}

/**
 * Masks every occurrence of `known` secrets, then anything that looks like a key or bearer token.
 */
export function redactSecrets(text: string, known: readonly string[] = []): string {
  let redacted = text;
  for (const secret of known) {
    if (secret.length >= 4) {
      redacted = redacted.split(secret).join(mask(secret));
    }
  }
  for (const pattern of SECRET_PATTERNS) {
    redacted = redacted.replace(pattern, mask);
  }
  return redacted;
}
