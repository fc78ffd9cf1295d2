import winston from 'winston';

// JSON.stringify that survives BigInts and circular references.
export function safeStringify(value: unknown): string {
  const seen = new WeakSet<object>();
  try {
    return JSON.stringify(value, (_key, item: unknown) => {
      if (typeof item === 'bigint') {
        return item.toString() + 'n';
      }
      if (typeof item === 'object' && item !== null) {
        if (seen.has(item)) {
          return '[Circular]';
        }
        seen.add(item);
      }
      return item;
    }, 2);
  } catch (e) {
    if (e instanceof Error) {
      return `[Unserializable Object: ${e.message}]`;
    }
    return '[Unserializable Object]';
  }
}

export function logSafeError(
  loggerInstance: winston.Logger,
  message: string,
  error: unknown,
  additionalContext?: Record<string, unknown>
): void {
  const logDetails: Record<string, string> = {
    messagePrimary: message, // winston reserves `message`
  };

  if (error instanceof Error) {
    logDetails.errorMessage = error.message;
    if (error.stack) {
      logDetails.errorStack = error.stack;
    }
  } else if (typeof error === 'object' && error !== null) {
    logDetails.errorObject = safeStringify(error);
  } else {
    logDetails.errorValue = String(error);
  }

  if (additionalContext) {
    logDetails.context = safeStringify(additionalContext);
  }

  loggerInstance.error(message, logDetails);
}
