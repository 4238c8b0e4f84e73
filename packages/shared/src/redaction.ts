const REDACTION_PLACEHOLDER = '[REDACTED]';

// Provider API keys and tokens
const apiKeyPatterns = [
  /sk-ant-[a-zA-Z0-9-]{20,}/g,
  /sk-(?:proj-)?[a-zA-Z0-9]{20,}/g,
  /gh[pousr]_[a-zA-Z0-9]{20,}/g,
  /Bearer\s+[a-zA-Z0-9._~+/-]{16,}=*/g,
];

// KEY=value assignments, as they show up in test output and subprocess env dumps
const envVarPatterns = [/(?:TOKEN|SECRET|API_KEY|PASSWORD)\s*=\s*['"]?([a-zA-Z0-9_-]+)['"]?/g];

const privateKeyPattern =
  /-----BEGIN (?:RSA |EC |OPENSSH )?PRIVATE KEY-----(?:.|\n|\r)*?-----END (?:RSA |EC |OPENSSH )?PRIVATE KEY-----/g;

const allPatterns = [...apiKeyPatterns, ...envVarPatterns, privateKeyPattern];

export function redactString(input: string): {
  redacted: string;
  redactionCount: number;
} {
  let redacted = input;
  let redactionCount = 0;

  for (const pattern of allPatterns) {
    const matches = redacted.match(pattern);
    if (matches) {
      redactionCount += matches.length;
      redacted = redacted.replace(pattern, REDACTION_PLACEHOLDER);
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

/**
 * Redacts secrets from a value before it is written to a trace or summary file.
 */
export function redactForLogs(input: unknown): unknown {
  return redactUnknown(input).redacted;
}
