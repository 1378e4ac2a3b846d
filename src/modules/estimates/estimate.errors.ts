export type EstimateErrorCode =
  | 'EMPTY_EXTRACTION'
  | 'COLUMN_RESOLUTION_INCOMPLETE'
  | 'UNSUPPORTED_DOCUMENT'
  | 'DOCUMENT_TOO_LARGE'
  | 'INVALID_CONFIGURATION'
  | 'EXTRACTION_FAILED';

export class EstimateError extends Error {
  constructor(
    readonly code: EstimateErrorCode,
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class EmptyExtractionError extends EstimateError {
  constructor() {
    super(
      'EMPTY_EXTRACTION',
      422,
      'No tables detected. Ensure the document has line-item tables (try exporting it from the estimating software as PDF).',
    );
  }
}

export class ColumnResolutionIncompleteError extends EstimateError {
  constructor(detail: string) {
    super('COLUMN_RESOLUTION_INCOMPLETE', 422, `Could not map columns: ${detail}`);
  }
}

export class UnsupportedDocumentError extends EstimateError {
  constructor(filename: string, mimetype: string) {
    super('UNSUPPORTED_DOCUMENT', 400, `Unsupported document ${filename} (${mimetype})`);
  }
}

export class DocumentTooLargeError extends EstimateError {
  constructor(size: number, limit: number) {
    super('DOCUMENT_TOO_LARGE', 413, `Document is ${size} bytes, the limit is ${limit}`);
  }
}

export class InvalidConfigurationError extends EstimateError {
  constructor(message: string) {
    super('INVALID_CONFIGURATION', 400, message);
  }
}

export class ExtractionFailedError extends EstimateError {
  constructor(message: string) {
    super('EXTRACTION_FAILED', 502, message);
  }
}
