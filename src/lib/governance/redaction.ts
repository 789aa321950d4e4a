/**
 * Light masking for free text written to the audit trail.
 */

const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g;
const PHONE_PATTERN = /\b(\+?\d[\d\- ]{8,}\d)\b/g;
const IPV4_PATTERN = /\b(?:\d{1,3}\.){3}\d{1,3}\b/g;

export function maskPII(text: string): string {
  if (!text) return text;
  return text
    .replace(EMAIL_PATTERN, '[EMAIL]')
    .replace(PHONE_PATTERN, '[PHONE]')
    .replace(IPV4_PATTERN, '[IPV4]');
}

export function maskAttributes(attributes: Readonly<Record<string, string>>): Record<string, string> {
  const masked: Record<string, string> = {};
  for (const [key, value] of Object.entries(attributes)) {
    masked[key] = maskPII(value);
  }
  return masked;
}
