/**
 * Base exception for pipeline errors
 */
export class PipelineException extends Error {
  constructor(
    message: string,
    public readonly source?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'PipelineException';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A configured source's export could not be read
 */
export class SourceLoadException extends PipelineException {
  constructor(
    source: string,
    public readonly filePath: string,
    cause?: Error,
  ) {
    super(
      `Failed to load source ${source} from ${filePath}${cause ? `: ${cause.message}` : ''}`,
      source,
      cause,
    );
    this.name = 'SourceLoadException';
  }
}

/**
 * Exception when no mapper is registered for a batch label
 */
export class UnknownSourceException extends PipelineException {
  constructor(source: string) {
    super(`No mapper found for source: ${source}`, source);
    this.name = 'UnknownSourceException';
  }
}

/**
 * A stage broke one of the row-count guarantees
 */
export class PipelineInvariantException extends PipelineException {
  constructor(message: string) {
    super(message);
    this.name = 'PipelineInvariantException';
  }
}
