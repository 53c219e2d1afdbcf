// Decoding errors.

/**
 * A response block or event line could not be decoded.
 *
 * On a live connection this means the stream is out of sync; the connection
 * treats it as fatal.
 */
export class ParseError extends Error {
  constructor(
    message: string,
    public readonly line: string,
  ) {
    super(message);
    this.name = "ParseError";
  }

  static missingStatus(line: string): ParseError {
    return new ParseError("response block does not end in a status line", line);
  }

  static malformedStatus(line: string, detail: string): ParseError {
    return new ParseError(`malformed status line: ${detail}`, line);
  }

  static malformedEvent(line: string): ParseError {
    return new ParseError("event line has no name", line);
  }

  static unexpectedStatus(line: string): ParseError {
    return new ParseError("status line received with no command outstanding", line);
  }
}
