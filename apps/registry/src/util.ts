function isObject(value: unknown): value is object {
  return value !== null && typeof value === "object";
}

export function isFileNotFoundError(error: unknown): boolean {
  return isObject(error) && "code" in error && error.code === "ENOENT";
}

/** fs/promises and fetch reject with an AbortError when their signal fires. */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}
