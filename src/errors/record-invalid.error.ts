import { colors } from "@mongez/copper";
import type { ModelError } from "../model/types";

/**
 * Error thrown when a model fails validation while being saved.
 *
 * The same entries are attached to the model (`model.errors`) so callers
 * that swallow the error (e.g. `association.create()`) can still inspect them.
 *
 * @example
 * ```typescript
 * try {
 *   await post.save();
 * } catch (error) {
 *   if (error instanceof RecordInvalidError) {
 *     console.log(error.errors);
 *     // [{ input: "title", error: "The title is required", type: "required" }]
 *   }
 * }
 * ```
 */
export class RecordInvalidError extends Error {
  /**
   * Name of the model class that failed validation.
   */
  public readonly modelName: string;

  /**
   * Validation errors reported for the model.
   */
  public readonly errors: ModelError[];

  public constructor(modelName: string, errors: ModelError[]) {
    super(`[${modelName} Model] Validation failed`);
    this.name = "RecordInvalidError";
    this.modelName = modelName;
    this.errors = errors;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RecordInvalidError);
    }
  }

  /**
   * Custom inspect method for Node.js console output.
   */
  [Symbol.for("nodejs.util.inspect.custom")](): string {
    return this.toString();
  }

  /**
   * Get a colored, field-by-field representation of the errors.
   */
  public toString(): string {
    const lines: string[] = ["", colors.red(`Validation Error: ${this.modelName}`), ""];

    const errorsByField = new Map<string, ModelError[]>();

    for (const error of this.errors) {
      const fieldErrors = errorsByField.get(error.input) ?? [];
      fieldErrors.push(error);
      errorsByField.set(error.input, fieldErrors);
    }

    for (const [fieldName, fieldErrors] of errorsByField) {
      lines.push(colors.yellow(`  Field: ${fieldName}`));

      for (const fieldError of fieldErrors) {
        lines.push(colors.white(`  Error: ${fieldError.error}`));

        if (fieldError.type) {
          lines.push(colors.cyan(`  Type:  ${fieldError.type}`));
        }
      }

      lines.push("");
    }

    return lines.join("\n");
  }

  /**
   * Get validation errors for a specific field.
   */
  public getFieldErrors(field: string): ModelError[] {
    return this.errors.filter((error) => error.input === field);
  }

  /**
   * Check if a specific field has validation errors.
   */
  public hasFieldError(field: string): boolean {
    return this.errors.some((error) => error.input === field);
  }
}
