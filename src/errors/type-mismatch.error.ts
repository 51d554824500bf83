/**
 * Error thrown when a record of the wrong model type is added to an association.
 */
export class TypeMismatchError extends Error {
  /**
   * Name of the association receiving the record.
   */
  public readonly relationName: string;

  /**
   * Expected model class name.
   */
  public readonly expected: string;

  /**
   * Class name of the rejected record.
   */
  public readonly received: string;

  public constructor(relationName: string, expected: string, received: string) {
    super(
      `${expected} expected for association "${relationName}", got ${received} instead.`,
    );
    this.name = "TypeMismatchError";
    this.relationName = relationName;
    this.expected = expected;
    this.received = received;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TypeMismatchError);
    }
  }
}
