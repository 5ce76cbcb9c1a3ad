/**
 * The dataset could not be loaded: the download failed, the file could not
 * be parsed, or a required column is missing. Nothing is rendered past it.
 */
export class LoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LoadError";
  }
}
