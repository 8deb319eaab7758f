/**
 * Error thrown when the planner configuration is unusable.
 *
 * Raised before any demand is expanded, so no partial plan exists.
 * Common causes are a non-positive utilization, a negative or fractional
 * capacity, or an unknown algorithm name.
 *
 * @category Errors
 */
export class InvalidConfigurationError extends Error {
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(message);
    this.name = "InvalidConfigurationError";
    this.issues = issues;
  }
}

/**
 * Error thrown when a customer requirement reaches the planner in a state
 * the input reader should have rejected (empty window, priority outside 1-5,
 * duplicate name).
 *
 * @category Errors
 */
export class InputContractError extends Error {
  public readonly customer: string | undefined;
  public readonly issues: readonly string[];

  constructor(message: string, customer: string | undefined, issues: readonly string[] = []) {
    super(message);
    this.name = "InputContractError";
    this.customer = customer;
    this.issues = issues;
  }
}

/**
 * Error thrown by the CSV reader for a malformed file or row.
 *
 * `row` is 1-based and counts the header as row 1; it is undefined for
 * file-level problems such as a missing header column.
 *
 * @category Errors
 */
export class InputParseError extends Error {
  public readonly row: number | undefined;

  constructor(message: string, row?: number) {
    super(message);
    this.name = "InputParseError";
    this.row = row;
  }
}
