export class MalformedRecordError extends Error {
  constructor(
    message: string,
    public readonly context: {
      source?: string;
      line?: number;
      record?: string;
    } = {}
  ) {
    super(message);
    this.name = 'MalformedRecordError';
  }
}

export class UnknownPlayerError extends Error {
  constructor(
    message: string,
    public readonly context: {
      missing: string[];
    }
  ) {
    super(message);
    this.name = 'UnknownPlayerError';
  }
}

export class OutputWriteError extends Error {
  constructor(
    message: string,
    public readonly context: {
      path: string;
      cause?: unknown;
    }
  ) {
    super(message);
    this.name = 'OutputWriteError';
  }
}
