/**
 * Raised before any search work when the caller hands the solver something
 * it cannot run on: a negative timeout, no variables, duplicate IDs, bad weights.
 * Search failure is never reported through this error.
 */
export class InvalidSolverInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidSolverInputError';
  }
}
