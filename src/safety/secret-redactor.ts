// src/safety/secret-redactor.ts — Token material redaction for logs and error text
//
// Scans text for credential shapes that pass through the gateway (JWTs, Bearer
// headers, form-encoded client secrets and assertions) and replaces them with
// typed [REDACTED:type] placeholders. Known secret values (the configured
// client secret) are replaced wherever they appear, whatever surrounds them.

export interface RedactionPattern {
  name: string
  pattern: RegExp
  replacement: string
}

export interface SecretLiteral {
  label: string
  value: string
}

export const DEFAULT_REDACTION_PATTERNS: readonly RedactionPattern[] = [
  // Bearer first so the whole header value is replaced, not just the JWT inside it
  { name: "bearer", pattern: /Bearer\s+[A-Za-z0-9\-._~+/]+=*/g, replacement: "Bearer [REDACTED:bearer]" },
  { name: "jwt", pattern: /eyJ[A-Za-z0-9_-]*\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]*/g, replacement: "[REDACTED:jwt]" },
  { name: "client-secret", pattern: /(client_secret=)[^&\s"]+/gi, replacement: "$1[REDACTED:client-secret]" },
  { name: "assertion", pattern: /(assertion=)[^&\s"]+/gi, replacement: "$1[REDACTED:assertion]" },
  { name: "access-token-field", pattern: /("access_token"\s*:\s*")[^"]+(")/g, replacement: "$1[REDACTED:access-token]$2" },
]

export class SecretRedactor {
  private patterns: RedactionPattern[]
  private readonly literals: SecretLiteral[]

  constructor(extraPatterns?: RedactionPattern[], literals: SecretLiteral[] = []) {
    this.patterns = [...DEFAULT_REDACTION_PATTERNS, ...(extraPatterns ?? [])]
    this.literals = literals.filter((l) => l.value.length > 0)
    // Without the global flag replace() only touches the first match
    for (const p of this.patterns) {
      if (!p.pattern.global) {
        throw new Error(`RedactionPattern "${p.name}" must have the global flag`)
      }
    }
  }

  redact(text: string): string {
    let result = text
    for (const { label, value } of this.literals) {
      result = result.split(value).join(`[REDACTED:${label}]`)
    }
    for (const p of this.patterns) {
      p.pattern.lastIndex = 0
      result = result.replace(p.pattern, p.replacement)
    }
    return result
  }
}
