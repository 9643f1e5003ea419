export type PlainObject = Record<string, unknown>;

export function isPlainObject(value: unknown): value is PlainObject {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    [Object.prototype, null].includes(Object.getPrototypeOf(value))
  );
}

export function ensureString(
  value: unknown,
  field: string,
  options?: { maxLength?: number }
): string {
  if (typeof value !== 'string') {
    throw new Error(`Field "${field}" must be a string.`);
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new Error(`Field "${field}" cannot be empty.`);
  }
  if (options?.maxLength && trimmed.length > options.maxLength) {
    throw new Error(`Field "${field}" exceeds maximum length of ${options.maxLength}`);
  }
  return trimmed;
}

export function ensureBoolean(value: unknown, field: string): boolean {
  if (typeof value !== 'boolean') {
    throw new Error(`Field "${field}" must be a boolean.`);
  }
  return value;
}

export function ensureNumber(
  value: unknown,
  field: string,
  options?: { min?: number; max?: number; integer?: boolean }
): number {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new Error(`Field "${field}" must be a number.`);
  }
  if (options?.integer && !Number.isInteger(value)) {
    throw new Error(`Field "${field}" must be an integer.`);
  }
  if (options?.min !== undefined && value < options.min) {
    throw new Error(`Field "${field}" must be >= ${options.min}.`);
  }
  if (options?.max !== undefined && value > options.max) {
    throw new Error(`Field "${field}" must be <= ${options.max}.`);
  }
  return value;
}

/**
 * Parses a TCP port given on the command line or in the environment.
 */
export function parsePort(value: string, field: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new Error(`Field "${field}" must be an integer.`);
  }
  return ensureNumber(Number.parseInt(value, 10), field, { integer: true, min: 0, max: 65535 });
}
