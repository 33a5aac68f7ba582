export class StackLensError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StackLensError';
  }
}

export class EmptyBatchError extends StackLensError {
  constructor(message = 'Cannot summarize an empty batch: percentages are undefined for zero sites') {
    super(message);
    this.name = 'EmptyBatchError';
  }
}

export class InvalidRecordError extends StackLensError {
  readonly source: string;

  constructor(source: string, detail: string) {
    super(`Invalid site record in ${source}: ${detail}`);
    this.name = 'InvalidRecordError';
    this.source = source;
  }
}

export class SignatureLoadError extends StackLensError {
  constructor(detail: string) {
    super(`Failed to load signature rules: ${detail}`);
    this.name = 'SignatureLoadError';
  }
}

export class ConfigError extends StackLensError {
  constructor(detail: string) {
    super(`Invalid configuration: ${detail}`);
    this.name = 'ConfigError';
  }
}
