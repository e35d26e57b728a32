/**
 * HTML Table Renderer
 *
 * Converts a sequence of records to a styled HTML <table> for reports and
 * emails. Column order comes from the first record (or an explicit column
 * list); per-cell styles come from the declarative formatting rules.
 */

import type {
  CellFormattingRule,
  HtmlTableOptions,
  HtmlTableRenderResult,
  TableRecord,
} from './types';
import { TableConfigurationError } from './types';
import { HtmlTableWriter } from './writer';

/**
 * Render records to an HTML table
 *
 * This is the main entry point for table rendering. The input is read in a
 * single pass, so any iterable works.
 *
 * @param records - Records to render, one row each
 * @param options - Title, colors and styles
 * @param columns - Explicit column order (overrides options.columns)
 * @param cellFormatting - Formatting rules (override options.cellFormattingRules)
 * @returns HTML markup
 * @throws TableConfigurationError if the configuration is invalid
 */
export function renderHtmlTable(
  records: Iterable<TableRecord>,
  options: HtmlTableOptions = {},
  columns?: readonly string[],
  cellFormatting?: readonly CellFormattingRule[]
): string {
  const writer = new HtmlTableWriter(options, columns, cellFormatting);

  for (const record of records) {
    writer.write(record);
  }

  return writer.end();
}

/**
 * Render records, reporting configuration errors instead of throwing
 */
export function safeRenderHtmlTable(
  records: Iterable<TableRecord>,
  options: HtmlTableOptions = {},
  columns?: readonly string[],
  cellFormatting?: readonly CellFormattingRule[]
): HtmlTableRenderResult {
  let writer: HtmlTableWriter;

  try {
    writer = new HtmlTableWriter(options, columns, cellFormatting);
  } catch (error) {
    if (error instanceof TableConfigurationError) {
      return {
        output: '',
        success: false,
        validation: { valid: false, errors: error.issues, warnings: error.warnings },
      };
    }
    throw error;
  }

  for (const record of records) {
    writer.write(record);
  }

  return {
    output: writer.end(),
    success: true,
    validation: writer.validation,
  };
}
