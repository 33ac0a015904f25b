export function formatUnknownError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause;
    if (cause instanceof Error) {
      return `${error.message} (cause: ${cause.message})`;
    }
    if (cause !== undefined && cause !== null) {
      return `${error.message} (cause: ${String(cause)})`;
    }
    return error.message;
  }
  return String(error);
}
