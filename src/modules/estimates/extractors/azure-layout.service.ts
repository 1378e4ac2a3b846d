import { Injectable, Logger } from '@nestjs/common';
import * as joi from 'joi';

import { envs } from '../../../config';
import { ExtractionFailedError } from '../estimate.errors';
import type { RawGrid } from '../interfaces';

type OperationStatus = 'notStarted' | 'running' | 'succeeded' | 'failed' | 'canceled';

export interface LayoutCell {
  rowIndex: number;
  columnIndex: number;
  content: string;
}

export interface LayoutTable {
  rowCount: number;
  columnCount: number;
  cells: LayoutCell[];
  boundingRegions: { pageNumber: number }[];
}

interface AnalyzeOperation {
  status: OperationStatus;
  analyzeResult?: { tables: LayoutTable[] };
  error?: { code?: string; message?: string };
}

const operationSchema = joi
  .object<AnalyzeOperation>({
    status: joi.string().valid('notStarted', 'running', 'succeeded', 'failed', 'canceled').required(),
    analyzeResult: joi
      .object({
        tables: joi
          .array()
          .items(
            joi
              .object({
                rowCount: joi.number().integer().min(0).required(),
                columnCount: joi.number().integer().min(0).required(),
                cells: joi
                  .array()
                  .items(
                    joi
                      .object({
                        rowIndex: joi.number().integer().min(0).required(),
                        columnIndex: joi.number().integer().min(0).required(),
                        content: joi.string().allow('').default(''),
                      })
                      .unknown(true),
                  )
                  .default([]),
                boundingRegions: joi
                  .array()
                  .items(joi.object({ pageNumber: joi.number().integer().required() }).unknown(true))
                  .default([]),
              })
              .unknown(true),
          )
          .default([]),
      })
      .unknown(true),
    error: joi.object({ code: joi.string(), message: joi.string() }).unknown(true),
  })
  .unknown(true);

const MAX_POLLS = 150;

export function tableToGrid(table: LayoutTable): RawGrid {
  const grid: RawGrid = Array.from({ length: table.rowCount }, () =>
    Array.from({ length: table.columnCount }, () => ''),
  );
  for (const cell of table.cells) {
    const row = grid[cell.rowIndex];
    if (row && cell.columnIndex < row.length) {
      row[cell.columnIndex] = cell.content.trim();
    }
  }
  return grid;
}

const firstPage = (table: LayoutTable) => table.boundingRegions[0]?.pageNumber ?? 0;

/**
 * Table extraction for PDFs through the Document Intelligence layout model.
 */
@Injectable()
export class AzureLayoutService {
  private readonly logger = new Logger(AzureLayoutService.name);
  private readonly endpoint = envs.azureDiEndpoint;
  private readonly key = envs.azureDiKey;

  get configured(): boolean {
    return this.endpoint !== null && this.key !== null;
  }

  async extractTables(buffer: Buffer): Promise<RawGrid[]> {
    if (this.endpoint === null || this.key === null) {
      throw new ExtractionFailedError('PDF table extraction is not configured');
    }

    const url = `${this.endpoint}/documentintelligence/documentModels/prebuilt-layout:analyze?api-version=${envs.azureDiApiVersion}`;

    const postResp = await fetch(url, {
      method: 'POST',
      headers: {
        'Ocp-Apim-Subscription-Key': this.key,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({ base64Source: buffer.toString('base64') }),
    });

    if (!postResp.ok && postResp.status !== 202) {
      throw new ExtractionFailedError(
        `Layout analysis rejected (${postResp.status}): ${await postResp.text()}`,
      );
    }

    const operationLocation = postResp.headers.get('Operation-Location');
    if (!operationLocation) {
      throw new ExtractionFailedError('Layout analysis returned no Operation-Location');
    }

    const operation = await this.poll(operationLocation, this.key);
    // Tables come back in reading order; a stable sort keeps it within a page.
    const tables = [...(operation.analyzeResult?.tables ?? [])].sort(
      (a, b) => firstPage(a) - firstPage(b),
    );

    this.logger.log(`Layout analysis found ${tables.length} table(s)`);
    return tables.map(tableToGrid);
  }

  private async poll(operationLocation: string, key: string): Promise<AnalyzeOperation> {
    for (let attempt = 0; attempt < MAX_POLLS; attempt++) {
      const getResp = await fetch(operationLocation, {
        method: 'GET',
        headers: { 'Ocp-Apim-Subscription-Key': key },
      });

      if (!getResp.ok) {
        throw new ExtractionFailedError(
          `Layout status check failed (${getResp.status}): ${await getResp.text()}`,
        );
      }

      const { error, value } = operationSchema.validate(await getResp.json());
      if (error) {
        throw new ExtractionFailedError(`Unexpected layout response: ${error.message}`);
      }

      if (value.status === 'succeeded') return value;
      if (value.status === 'failed' || value.status === 'canceled') {
        throw new ExtractionFailedError(
          `Layout analysis ${value.status}: ${value.error?.message ?? 'no details'}`,
        );
      }

      await new Promise((r) => setTimeout(r, envs.azureDiPollIntervalMs));
    }

    throw new ExtractionFailedError(`Layout analysis still running after ${MAX_POLLS} checks`);
  }
}
