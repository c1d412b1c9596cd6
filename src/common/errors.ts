export function stringifyError(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  return String(value);
}

/** Input data that cannot be interpreted; callers decide whether to skip or abort. */
export class DataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DataError";
  }
}

export function isDataError(value: unknown): value is DataError {
  return value instanceof Error && value.name === "DataError";
}
