const REDACTION_PLACEHOLDER = '[REDACTED]';

interface RedactionRule {
  pattern: RegExp;
  replacement: string;
}

const rules: RedactionRule[] = [
  // Credentials embedded in remote URLs: https://x-access-token:<token>@github.com/...
  { pattern: /(\w+:\/\/)[^/\s:@]+(?::[^/\s@]+)?@/g, replacement: `$1${REDACTION_PLACEHOLDER}@` },
  // Authorization headers
  { pattern: /\b(Bearer|token)\s+[A-Za-z0-9._~+/=-]{8,}/g, replacement: `$1 ${REDACTION_PLACEHOLDER}` },
  // OpenAI-compatible keys (merge service)
  { pattern: /sk-[a-zA-Z0-9_-]{20,}/g, replacement: REDACTION_PLACEHOLDER },
  // GitHub tokens
  { pattern: /gh[pousr]_[a-zA-Z0-9]{20,}/g, replacement: REDACTION_PLACEHOLDER },
  { pattern: /github_pat_[a-zA-Z0-9_]{20,}/g, replacement: REDACTION_PLACEHOLDER },
  // Environment variable assignments
  {
    pattern: /(?:TOKEN|SECRET|API_KEY)\s*=\s*['"]?([a-zA-Z0-9_-]+)['"]?/g,
    replacement: REDACTION_PLACEHOLDER,
  },
];

export function redactString(input: string): {
  redacted: string;
  redactionCount: number;
} {
  let redacted = input;
  let redactionCount = 0;

  for (const { pattern, replacement } of rules) {
    const matches = redacted.match(pattern);
    if (matches) {
      redactionCount += matches.length;
      redacted = redacted.replace(pattern, replacement);
    }
  }

  return { redacted, redactionCount };
}

export function redactUnknown(input: unknown): {
  redacted: unknown;
  redactionCount: number;
} {
  if (typeof input === 'string') {
    return redactString(input);
  }

  if (Array.isArray(input)) {
    let totalRedactions = 0;
    const redactedArray = input.map((item) => {
      const { redacted, redactionCount } = redactUnknown(item);
      totalRedactions += redactionCount;
      return redacted;
    });
    return { redacted: redactedArray, redactionCount: totalRedactions };
  }

  if (typeof input === 'object' && input !== null) {
    let totalRedactions = 0;
    const redactedObj: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      const { redacted, redactionCount } = redactUnknown(value);
      totalRedactions += redactionCount;
      redactedObj[key] = redacted;
    }
    return { redacted: redactedObj, redactionCount: totalRedactions };
  }

  return { redacted: input, redactionCount: 0 };
}

export function redactText(input: string): string {
  return redactString(input).redacted;
}
