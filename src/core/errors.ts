/**
 * Error taxonomy. Rule failures are never errors; these cover inputs the
 * engine cannot evaluate at all.
 */

export class EvaluationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed or unusable input document, or an unusable capture. */
export class ExtractionError extends EvaluationError {}

/** Two snapshots measured at different breakpoints. */
export class IncompatibleSnapshotError extends EvaluationError {}

/** Two images with different width, height or channel count. */
export class DimensionMismatchError extends EvaluationError {}

/** Computed style data is structurally absent. */
export class ValidatorInputError extends EvaluationError {}

/** Invalid configuration value or configuration file. */
export class ConfigError extends EvaluationError {}
