/**
 * Report processing errors.
 *
 * Every subclass is fatal for the run that raised it: the orchestrator lets it
 * propagate and no partial artifacts are returned. Soft failures (unparsable
 * cells, missing optional rows) never throw; they are logged and collected as
 * warnings instead.
 */

export class ReportError extends Error {
  readonly fatal = true;
  /** Name of the report or frame the error concerns, when known. */
  readonly report?: string;

  constructor(message: string, report?: string) {
    super(message);
    this.name = 'ReportError';
    this.report = report;
  }
}

/**
 * No line of the report contains the header marker.
 */
export class HeaderNotFoundError extends ReportError {
  readonly marker: string;

  constructor(marker: string, report?: string) {
    super(
      `Header row not found${report ? ` in ${report}` : ''}: no line contains "${marker}"`,
      report,
    );
    this.name = 'HeaderNotFoundError';
    this.marker = marker;
  }
}

/**
 * A column required for reconciliation or aggregation is absent.
 */
export class MissingColumnError extends ReportError {
  readonly column: string;

  constructor(column: string, report?: string) {
    super(`Column "${column}" not found${report ? ` in ${report}` : ''}`, report);
    this.name = 'MissingColumnError';
    this.column = column;
  }
}

/**
 * A report parsed to zero data rows.
 */
export class EmptyInputError extends ReportError {
  constructor(report?: string) {
    super(`${report ?? 'Report'} is empty or has no data rows`, report);
    this.name = 'EmptyInputError';
  }
}

/**
 * Not a single value of a date column could be parsed.
 */
export class DateParseError extends ReportError {
  readonly column: string;

  constructor(column: string, report?: string) {
    super(`No value of column "${column}"${report ? ` in ${report}` : ''} is a recognizable date`, report);
    this.name = 'DateParseError';
    this.column = column;
  }
}

/**
 * The P&L template workbook cannot be used.
 */
export class TemplateError extends ReportError {
  constructor(message: string) {
    super(message, 'template');
    this.name = 'TemplateError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
