import { Injectable, Logger } from '@nestjs/common';

import { UnsupportedDocumentError } from '../estimate.errors';
import type { RawGrid } from '../interfaces';
import { AzureLayoutService } from './azure-layout.service';
import { csvToGrids, workbookToGrids } from './spreadsheet.extractor';

export type DocumentKind = 'pdf' | 'csv' | 'xlsx';

const MIME_KINDS: Record<string, DocumentKind> = {
  'application/pdf': 'pdf',
  'text/csv': 'csv',
  'application/csv': 'csv',
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet': 'xlsx',
  'application/vnd.ms-excel': 'xlsx',
};

const EXTENSION_KINDS: Record<string, DocumentKind> = {
  pdf: 'pdf',
  csv: 'csv',
  xlsx: 'xlsx',
  xls: 'xlsx',
};

export function documentKind(filename: string, mimetype: string): DocumentKind | null {
  const byMime = MIME_KINDS[mimetype.toLowerCase()];
  if (byMime) return byMime;
  const extension = filename.toLowerCase().split('.').pop() ?? '';
  return EXTENSION_KINDS[extension] ?? null;
}

@Injectable()
export class TableExtractionService {
  private readonly logger = new Logger(TableExtractionService.name);

  constructor(private readonly azureLayout: AzureLayoutService) {}

  availableKinds(): DocumentKind[] {
    return this.azureLayout.configured ? ['pdf', 'csv', 'xlsx'] : ['csv', 'xlsx'];
  }

  async extract(buffer: Buffer, filename: string, mimetype: string): Promise<RawGrid[]> {
    const kind = documentKind(filename, mimetype);
    if (kind === null) {
      throw new UnsupportedDocumentError(filename, mimetype);
    }

    this.logger.log(`Extracting tables from ${filename} as ${kind}`);
    switch (kind) {
      case 'pdf':
        return this.azureLayout.extractTables(buffer);
      case 'csv':
        return csvToGrids(buffer);
      case 'xlsx':
        return workbookToGrids(buffer);
    }
  }
}
