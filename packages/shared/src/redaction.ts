export const REDACTION_PLACEHOLDER = '[REDACTED]';

const SECRET_PATTERNS: RegExp[] = [
  /sk-ant-[a-zA-Z0-9_-]{20,}/g,
  /sk-[a-zA-Z0-9]{20,}/g,
  /gh[pousr]_[a-zA-Z0-9]{20,}/g,
  /AKIA[0-9A-Z]{16}/g,
  /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g,
];

// Only the value is replaced so the variable name stays readable in transcripts.
const ASSIGNMENT_PATTERN = /\b([A-Z0-9_]*(?:TOKEN|SECRET|API_KEY|PASSWORD))(\s*[=:]\s*)(['"]?)[^\s'"]+\3/g;

export interface RedactionResult<T> {
  redacted: T;
  redactionCount: number;
}

export function redactString(input: string): RedactionResult<string> {
  let redacted = input;
  let redactionCount = 0;

  for (const pattern of SECRET_PATTERNS) {
    redacted = redacted.replace(pattern, () => {
      redactionCount++;
      return REDACTION_PLACEHOLDER;
    });
  }

  redacted = redacted.replace(ASSIGNMENT_PATTERN, (match, name: string, sep: string, quote: string) => {
    if (match.endsWith(REDACTION_PLACEHOLDER + quote)) {
      return match;
    }
    redactionCount++;
    return `${name}${sep}${quote}${REDACTION_PLACEHOLDER}${quote}`;
  });

  return { redacted, redactionCount };
}

export function redactUnknown(input: unknown): RedactionResult<unknown> {
  if (typeof input === 'string') {
    return redactString(input);
  }

  if (Array.isArray(input)) {
    let total = 0;
    const redacted = input.map((item) => {
      const result = redactUnknown(item);
      total += result.redactionCount;
      return result.redacted;
    });
    return { redacted, redactionCount: total };
  }

  if (typeof input === 'object' && input !== null) {
    let total = 0;
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      const result = redactUnknown(value);
      total += result.redactionCount;
      redacted[key] = result.redacted;
    }
    return { redacted, redactionCount: total };
  }

  return { redacted: input, redactionCount: 0 };
}

/**
 * Redacts secrets anywhere inside a JSON-like value before it is written to disk.
 */
export function redactForLogs(input: unknown): unknown {
  return redactUnknown(input).redacted;
}
