// Raised for malformed input shape, before any iteration starts.
// Numeric pathologies never throw; they surface as `converged: false`.
export class InvalidInputError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(message);
    this.name = "InvalidInputError";
    this.path = path;
  }
}

export function isInvalidInputError(error: unknown): error is InvalidInputError {
  return error instanceof InvalidInputError;
}
