/**
 * Base class for errors the store raises on purpose. Driver failures
 * (I/O, corruption, constraint violations other than the ones below) are not
 * wrapped and reach the caller as the driver's own errors.
 */
export class PromptStoreError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A prompt document with this name already exists. The existing row is left
 * as it was.
 */
export class DuplicateNameError extends PromptStoreError {
  constructor(
    readonly documentName: string,
    options?: ErrorOptions,
  ) {
    super(`Prompt document "${documentName}" already exists`, options);
  }
}
