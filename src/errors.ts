export class ClaiError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed command line. `usage` is the help text to show the user. */
export class UsageError extends ClaiError {
  usage: string;

  constructor(message: string, usage: string) {
    super(message);
    this.usage = usage;
  }
}

export class ConfigurationError extends ClaiError {}

export class EditorError extends ClaiError {}

export class HttpError extends ClaiError {
  status: number;
  statusText: string;
  body: string;

  constructor(status: number, statusText: string, body: string) {
    super(`Chat API request failed with status ${status}${statusText ? ` ${statusText}` : ''}`);
    this.status = status;
    this.statusText = statusText;
    this.body = body;
  }
}

/** The chat API answered 2xx but the body is not the expected completion shape. */
export class ResponseFormatError extends ClaiError {}
