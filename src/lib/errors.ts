export class ParserError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidNessusFile extends ParserError {}

export class EmptyReportError extends ParserError {}
