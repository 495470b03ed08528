export class CorpusError extends Error {
  constructor(message: string, readonly path?: string) {
    super(message);
    this.name = "CorpusError";
  }
}

export interface DecodeAttempt {
  encoding: string;
  reason: string;
}

/** None of the candidate encodings could decode the file. */
export class CorpusEncodingError extends CorpusError {
  constructor(readonly attempts: DecodeAttempt[], path?: string) {
    const tried = attempts.map((a) => a.encoding).join(", ");
    super(`unable to decode corpus${path ? ` "${path}"` : ""} with any of: ${tried}`, path);
    this.name = "CorpusEncodingError";
  }
}

/** The decoded text is not valid CSV. */
export class CorpusFormatError extends CorpusError {
  constructor(detail: string, path?: string) {
    super(`malformed corpus${path ? ` "${path}"` : ""}: ${detail}`, path);
    this.name = "CorpusFormatError";
  }
}
