/**
 * Error types raised by the generator pipeline
 */

export class HelpDocError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Source could not be read or parsed. Nothing is rendered or persisted. */
export class ParseFailure extends HelpDocError {
  readonly filePath: string;
  readonly line: number | null;

  constructor(filePath: string, message: string, line: number | null = null, options?: ErrorOptions) {
    super(line === null ? `${filePath}: ${message}` : `${filePath}:${line}: ${message}`, options);
    this.filePath = filePath;
    this.line = line;
  }
}

export class StoreError extends HelpDocError {}

export class OutputWriteError extends HelpDocError {
  readonly outputPath: string;

  constructor(outputPath: string, options?: ErrorOptions) {
    super(`Failed to write help file: ${outputPath}`, options);
    this.outputPath = outputPath;
  }
}
