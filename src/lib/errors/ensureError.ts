/**
 * Normalises anything thrown into an `Error`, keeping the original value as `cause`
 * when it was not already one.
 */
export const ensureError = (value: unknown, fallbackMessage = 'Unknown error'): Error => {
  if (value instanceof Error) {
    return value;
  }

  if (value && typeof value === 'object' && 'message' in value) {
    const message = value.message;
    return new Error(typeof message === 'string' ? message : fallbackMessage, { cause: value });
  }

  return new Error(typeof value === 'string' ? value : fallbackMessage, { cause: value });
};
