import { Inject, Injectable, Logger } from '@nestjs/common';
import { ClientProxy, RpcException } from '@nestjs/microservices';

import { EstimateEvents, envs, NATS_SERVICE } from '../../config';
import { AnalyzeEstimateDto, ColumnSelectionDto, ResumeEstimateDto } from './dto';
import {
  ColumnResolutionIncompleteError,
  DocumentTooLargeError,
  EmptyExtractionError,
  EstimateError,
} from './estimate.errors';
import { TableExtractionService } from './extractors/table-extraction.service';
import type {
  AnalysisOutcome,
  ColumnRoleMap,
  CompletedAnalysis,
  CompleteColumnRoleMap,
  RawTable,
  RunConfig,
  TradeKeywords,
} from './interfaces';
import {
  buildRawTable,
  buildRunConfig,
  REQUIRED_ROLES,
  resolveColumns,
  runPipeline,
} from './pipeline';

export const TRADE_KEYWORDS = 'TRADE_KEYWORDS';

/** Explicit choices win over detected ones; blank choices are ignored. */
export function mergeColumnSelection(
  detected: ColumnRoleMap,
  selection: ColumnSelectionDto | undefined,
  columns: readonly string[],
): ColumnRoleMap {
  const merged: ColumnRoleMap = { ...detected };
  for (const role of ['description', 'total', 'quantity', 'unit'] as const) {
    const choice = selection?.[role]?.trim();
    if (!choice) continue;
    if (!columns.includes(choice)) {
      throw new ColumnResolutionIncompleteError(`column "${choice}" chosen for ${role} does not exist`);
    }
    merged[role] = choice;
  }
  return merged;
}

function asComplete(roles: ColumnRoleMap): CompleteColumnRoleMap | null {
  const { description, total } = roles;
  if (description === undefined || total === undefined) return null;
  return { ...roles, description, total };
}

@Injectable()
export class EstimatesService {
  private readonly logger = new Logger(EstimatesService.name);

  constructor(
    @Inject(NATS_SERVICE) private readonly client: ClientProxy,
    @Inject(TRADE_KEYWORDS) private readonly keywords: TradeKeywords,
    private readonly tableExtraction: TableExtractionService,
  ) {}

  async analyze(payload: AnalyzeEstimateDto): Promise<AnalysisOutcome> {
    try {
      const config = buildRunConfig(payload.contractors, payload.rules);

      const buffer = Buffer.from(payload.buffer, 'base64');
      if (buffer.byteLength > envs.maxDocumentBytes) {
        throw new DocumentTooLargeError(buffer.byteLength, envs.maxDocumentBytes);
      }

      const grids = await this.tableExtraction.extract(buffer, payload.filename, payload.mimetype);
      const table = buildRawTable(grids);
      if (table.rows.length === 0) {
        this.logger.warn(`No usable tables in ${payload.filename}`);
        throw new EmptyExtractionError();
      }
      this.logger.log(
        `Extracted ${table.rows.length} row(s) over ${table.columns.length} column(s) from ${payload.filename}`,
      );

      const resolution = resolveColumns(table.columns, envs.fuzzyMatchThreshold);
      const roles = mergeColumnSelection(resolution.roles, payload.columns, table.columns);
      const complete = asComplete(roles);

      if (complete === null) {
        const missing = REQUIRED_ROLES.filter((role) => roles[role] === undefined);
        this.logger.warn(`Column detection incomplete for ${payload.filename}, missing ${missing.join(', ')}`);
        return {
          status: 'needs-columns',
          message: `Auto-detection partial, please choose the ${missing.join(' and ')} column`,
          columns: table.columns,
          detected: roles,
          table,
        };
      }

      return this.complete(table, complete, config, payload.filename);
    } catch (error) {
      throw this.handleError(error);
    }
  }

  resume(payload: ResumeEstimateDto): CompletedAnalysis {
    try {
      const config = buildRunConfig(payload.contractors, payload.rules);
      const table: RawTable = { columns: payload.table.columns, rows: payload.table.rows };

      const detected = resolveColumns(table.columns, envs.fuzzyMatchThreshold).roles;
      const roles = mergeColumnSelection(detected, payload.columns, table.columns);
      const complete = asComplete(roles);
      if (complete === null) {
        const missing = REQUIRED_ROLES.filter((role) => roles[role] === undefined);
        throw new ColumnResolutionIncompleteError(`no ${missing.join(' or ')} column selected`);
      }

      return this.complete(table, complete, config);
    } catch (error) {
      throw this.handleError(error);
    }
  }

  health() {
    return {
      status: 'ok',
      extractors: this.tableExtraction.availableKinds(),
    };
  }

  private complete(
    table: RawTable,
    columns: CompleteColumnRoleMap,
    config: RunConfig,
    filename?: string,
  ): CompletedAnalysis {
    const report = runPipeline(table, columns, config, this.keywords);

    if (report.droppedRows > 0) {
      this.logger.debug(`Dropped ${report.droppedRows} row(s) without description or amount`);
    }
    this.logger.log(
      `Report ready: ${report.delegatedItems.length} item(s), total ${report.formatted.grandTotal}, assigned ${report.formatted.assignedTotal}`,
    );

    this.client.emit(EstimateEvents.reported, {
      filename: filename ?? null,
      itemCount: report.delegatedItems.length,
      summary: report.summary,
    });

    return { status: 'completed', report };
  }

  private handleError(error: unknown): RpcException {
    if (error instanceof RpcException) {
      return error;
    }

    if (error instanceof EstimateError) {
      return new RpcException({ status: error.status, code: error.code, message: error.message });
    }

    this.logger.error(error);
    return new RpcException({ status: 500, message: 'Internal server error' });
  }
}
