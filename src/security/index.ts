/**
 * Security helpers shared by the check library
 *
 * Provides:
 * - Schema validation for API responses and configuration
 * - Log sanitization
 */

// ===========================================
// SCHEMA VALIDATION (lightweight Zod-like)
// ===========================================

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

export interface Validator<T> {
  parse(input: unknown): T;
  safeParse(input: unknown): ValidationResult<T>;
}

export type Infer<V> = V extends Validator<infer T> ? T : never;

type Shape = Record<string, Validator<unknown>>;
type ObjectOutput<S extends Shape> = { [K in keyof S]: Infer<S[K]> };

abstract class BaseValidator<T> implements Validator<T> {
  parse(input: unknown): T {
    const result = this.safeParse(input);
    if (!result.success) throw new Error(result.error);
    return result.data;
  }

  abstract safeParse(input: unknown): ValidationResult<T>;
}

// String validator
class StringValidator extends BaseValidator<string> {
  private minLength?: number;
  private maxLength?: number;
  private pattern?: RegExp;

  min(length: number): StringValidator {
    const v = new StringValidator();
    Object.assign(v, this);
    v.minLength = length;
    return v;
  }

  max(length: number): StringValidator {
    const v = new StringValidator();
    Object.assign(v, this);
    v.maxLength = length;
    return v;
  }

  regex(pattern: RegExp): StringValidator {
    const v = new StringValidator();
    Object.assign(v, this);
    v.pattern = pattern;
    return v;
  }

  safeParse(input: unknown): ValidationResult<string> {
    if (typeof input !== 'string') {
      return { success: false, error: 'Expected string' };
    }
    if (this.minLength !== undefined && input.length < this.minLength) {
      return { success: false, error: `String must be at least ${this.minLength} characters` };
    }
    if (this.maxLength !== undefined && input.length > this.maxLength) {
      return { success: false, error: `String must be at most ${this.maxLength} characters` };
    }
    if (this.pattern && !this.pattern.test(input)) {
      return { success: false, error: 'String does not match required pattern' };
    }
    return { success: true, data: input };
  }
}

// Enum validator
class EnumValidator<T extends string> extends BaseValidator<T> {
  constructor(private values: readonly T[]) {
    super();
  }

  safeParse(input: unknown): ValidationResult<T> {
    const match = this.values.find(value => value === input);
    if (match === undefined) {
      return { success: false, error: `String must be one of: ${this.values.join(', ')}` };
    }
    return { success: true, data: match };
  }
}

// Number validator
class NumberValidator extends BaseValidator<number> {
  private minValue?: number;
  private maxValue?: number;
  private integerOnly = false;

  min(value: number): NumberValidator {
    const v = new NumberValidator();
    Object.assign(v, this);
    v.minValue = value;
    return v;
  }

  max(value: number): NumberValidator {
    const v = new NumberValidator();
    Object.assign(v, this);
    v.maxValue = value;
    return v;
  }

  int(): NumberValidator {
    const v = new NumberValidator();
    Object.assign(v, this);
    v.integerOnly = true;
    return v;
  }

  safeParse(input: unknown): ValidationResult<number> {
    if (typeof input !== 'number' || isNaN(input)) {
      return { success: false, error: 'Expected number' };
    }
    if (this.integerOnly && !Number.isInteger(input)) {
      return { success: false, error: 'Expected integer' };
    }
    if (this.minValue !== undefined && input < this.minValue) {
      return { success: false, error: `Number must be at least ${this.minValue}` };
    }
    if (this.maxValue !== undefined && input > this.maxValue) {
      return { success: false, error: `Number must be at most ${this.maxValue}` };
    }
    return { success: true, data: input };
  }
}

// Boolean validator
class BooleanValidator extends BaseValidator<boolean> {
  safeParse(input: unknown): ValidationResult<boolean> {
    if (typeof input !== 'boolean') {
      return { success: false, error: 'Expected boolean' };
    }
    return { success: true, data: input };
  }
}

// Accepts any value unchanged; the caller validates it later
class UnknownValidator extends BaseValidator<unknown> {
  safeParse(input: unknown): ValidationResult<unknown> {
    return { success: true, data: input };
  }
}

// Array validator
class ArrayValidator<T> extends BaseValidator<T[]> {
  constructor(private item: Validator<T>) {
    super();
  }

  safeParse(input: unknown): ValidationResult<T[]> {
    if (!Array.isArray(input)) {
      return { success: false, error: 'Expected array' };
    }

    const items: T[] = [];
    for (let i = 0; i < input.length; i++) {
      const itemResult = this.item.safeParse(input[i]);
      if (!itemResult.success) {
        return { success: false, error: `[${i}]: ${itemResult.error}` };
      }
      items.push(itemResult.data);
    }
    return { success: true, data: items };
  }
}

// Object validator - unknown keys are dropped
class ObjectValidator<S extends Shape> extends BaseValidator<ObjectOutput<S>> {
  constructor(private shape: S) {
    super();
  }

  safeParse(input: unknown): ValidationResult<ObjectOutput<S>> {
    if (typeof input !== 'object' || input === null || Array.isArray(input)) {
      return { success: false, error: 'Expected object' };
    }

    const source = new Map(Object.entries(input));
    const result: Record<string, unknown> = {};
    for (const [key, validator] of Object.entries(this.shape)) {
      const fieldResult = validator.safeParse(source.get(key));
      if (!fieldResult.success) {
        return { success: false, error: `${key}: ${fieldResult.error}` };
      }
      result[key] = fieldResult.data;
    }

    return { success: true, data: result as ObjectOutput<S> };
  }
}

// Optional wrapper - null and undefined both parse to undefined
class OptionalValidator<T> extends BaseValidator<T | undefined> {
  constructor(private inner: Validator<T>) {
    super();
  }

  safeParse(input: unknown): ValidationResult<T | undefined> {
    if (input === undefined || input === null) {
      return { success: true, data: undefined };
    }
    return this.inner.safeParse(input);
  }
}

// Schema factory
export const z = {
  string: () => new StringValidator(),
  number: () => new NumberValidator(),
  boolean: () => new BooleanValidator(),
  unknown: () => new UnknownValidator(),
  enum: <T extends string>(values: readonly T[]) => new EnumValidator(values),
  array: <T>(item: Validator<T>) => new ArrayValidator(item),
  object: <S extends Shape>(shape: S) => new ObjectValidator(shape),
  optional: <T>(validator: Validator<T>) => new OptionalValidator(validator),
};

// ===========================================
// LOG SANITIZATION
// ===========================================

const SENSITIVE_PATTERNS = [
  // Tokens
  { pattern: /Bearer\s+[A-Za-z0-9\-_.]+/gi, replacement: 'Bearer [REDACTED]' },
  { pattern: /eyJ[A-Za-z0-9\-_]+\.[A-Za-z0-9\-_]+\.[A-Za-z0-9\-_]+/g, replacement: '[REDACTED_JWT]' },

  // Passwords and secrets
  { pattern: /client[_-]?secret["']?\s*[:=]\s*["']?[^"'\s,}&]+/gi, replacement: 'client_secret: [REDACTED]' },
  { pattern: /password["']?\s*[:=]\s*["']?[^"'\s,}]+/gi, replacement: 'password: [REDACTED]' },

  // Email addresses and user principal names
  { pattern: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, replacement: '[EMAIL_REDACTED]' },
];

const SENSITIVE_KEYS = new Set([
  'authorization',
  'password',
  'secret',
  'clientsecret',
  'client_secret',
  'token',
  'accesstoken',
  'access_token',
  'certificatepfxbase64',
]);

export function sanitizeLogData(data: unknown): unknown {
  if (typeof data === 'string') {
    return sanitizeLogText(data);
  }

  if (Array.isArray(data)) {
    return data.map(item => sanitizeLogData(item));
  }

  if (typeof data === 'object' && data !== null) {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (SENSITIVE_KEYS.has(key.toLowerCase())) {
        sanitized[key] = '[REDACTED]';
      } else {
        sanitized[key] = sanitizeLogData(value);
      }
    }
    return sanitized;
  }

  return data;
}

export function sanitizeLogText(text: string): string {
  let sanitized = text;
  for (const { pattern, replacement } of SENSITIVE_PATTERNS) {
    sanitized = sanitized.replace(pattern, replacement);
  }
  return sanitized;
}
