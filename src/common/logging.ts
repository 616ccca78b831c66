type ErrorWithCode = Error & { code?: unknown; cause?: unknown };

const MAX_ERROR_STACK_LENGTH = 4 * 1024;
const MAX_CAUSE_DEPTH = 3;

export type StructuredError = {
  type: "error" | "non_error";
  name?: string;
  message: string;
  code?: string;
  stack?: string;
  cause?: StructuredError;
  details?: unknown;
};

export function toJsonSafe(value: unknown): unknown {
  try {
    return JSON.parse(
      JSON.stringify(value, (_key, current) => (typeof current === "bigint" ? current.toString() : current)),
    );
  } catch {
    return String(value);
  }
}

function truncateErrorStack(stack: string | undefined): string | undefined {
  if (!stack || stack.length <= MAX_ERROR_STACK_LENGTH) {
    return stack;
  }

  const omittedChars = stack.length - MAX_ERROR_STACK_LENGTH;
  return `${stack.slice(0, MAX_ERROR_STACK_LENGTH)}... [truncated ${omittedChars} chars]`;
}

function serialize(error: unknown, depth: number): StructuredError {
  if (error instanceof Error) {
    const typedError: ErrorWithCode = error;
    const rawCode = typedError.code;
    const stringCode = rawCode === null || rawCode === undefined ? undefined : String(rawCode);
    const structured: StructuredError = {
      type: "error",
      name: error.name,
      message: error.message,
      code: stringCode && stringCode.length > 0 ? stringCode : undefined,
      stack: truncateErrorStack(error.stack),
    };
    if (typedError.cause !== undefined && depth < MAX_CAUSE_DEPTH) {
      structured.cause = serialize(typedError.cause, depth + 1);
    }
    return structured;
  }

  if (typeof error === "string") {
    return {
      type: "non_error",
      message: error,
    };
  }

  return {
    type: "non_error",
    message: "Non-Error thrown",
    details: toJsonSafe(error),
  };
}

/**
 * Serializes unknown error values into structured JSON-friendly fields.
 * Nested `cause` chains are followed a few levels deep.
 */
export function toStructuredError(error: unknown): StructuredError {
  return serialize(error, 0);
}

/** Plain message of an unknown thrown value. */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error ?? "Unknown error");
}
