const INTEGER_PATTERN = /^[+-]?\d+$/;

const TRUE_SPELLINGS = new Set(['true', '1', 'yes', 'y', 'on', 't']);
const FALSE_SPELLINGS = new Set(['false', '0', 'no', 'n', 'off', 'f']);

/** Integers and integer strings only; anything else yields null. */
export function coerceInteger(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!INTEGER_PATTERN.test(trimmed)) {
      return null;
    }
    const parsed = Number(trimmed);
    return Number.isSafeInteger(parsed) ? parsed : null;
  }
  return null;
}

/** Case-insensitive boolean spellings; anything else yields null. */
export function coerceBoolean(value: unknown): boolean | null {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value !== 'string') {
    return null;
  }
  const lowered = value.toLowerCase();
  if (TRUE_SPELLINGS.has(lowered)) {
    return true;
  }
  return FALSE_SPELLINGS.has(lowered) ? false : null;
}
