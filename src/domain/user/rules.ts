// Domain: Credential validation rules
// Each rule is a named predicate with the code reported when it fails

export interface ValidationRule {
  code: string;
  description: string;
  test: (value: string) => boolean;
}

export const USERNAME_RULES: readonly ValidationRule[] = [
  {
    code: 'USERNAME_FORMAT',
    description: '3-20 characters: letters, digits or underscore',
    test: (value) => /^[A-Za-z0-9_]{3,20}$/.test(value),
  },
];

export const EMAIL_RULES: readonly ValidationRule[] = [
  {
    code: 'EMAIL_FORMAT',
    description: 'local-part@domain.tld',
    test: (value) => /^[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}$/.test(value),
  },
];

export const PASSWORD_SYMBOLS = '!@#$%^&*(),.?":{}|<>';

export const PASSWORD_RULES: readonly ValidationRule[] = [
  {
    code: 'PASSWORD_TOO_SHORT',
    description: 'at least 8 characters',
    test: (value) => value.length >= 8,
  },
  {
    code: 'PASSWORD_MISSING_UPPERCASE',
    description: 'at least one uppercase letter',
    test: (value) => /[A-Z]/.test(value),
  },
  {
    code: 'PASSWORD_MISSING_LOWERCASE',
    description: 'at least one lowercase letter',
    test: (value) => /[a-z]/.test(value),
  },
  {
    code: 'PASSWORD_MISSING_DIGIT',
    description: 'at least one digit',
    test: (value) => /[0-9]/.test(value),
  },
  {
    code: 'PASSWORD_MISSING_SYMBOL',
    description: `at least one of ${PASSWORD_SYMBOLS}`,
    test: (value) => [...value].some((ch) => PASSWORD_SYMBOLS.includes(ch)),
  },
];

/**
 * Evaluate every rule and return the codes of those that failed
 */
export function evaluateRules(value: string, rules: readonly ValidationRule[]): string[] {
  return rules.filter((rule) => !rule.test(value)).map((rule) => rule.code);
}

/**
 * Lookup key used for case-insensitive uniqueness and matching
 */
export function normalizeIdentifier(value: string): string {
  return value.trim().toLowerCase();
}
