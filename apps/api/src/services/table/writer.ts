/**
 * Incremental HTML table writer
 *
 * Accepts records one at a time. The title and header depend on the first
 * record's columns, so nothing is emitted until the first write() or end().
 */

import type {
  CellFormattingRule,
  HtmlTableOptions,
  ResolvedTableOptions,
  TableRecord,
  TableValidationResult,
} from './types';
import { TableConfigurationError } from './types';
import { resolveColumns } from './records';
import { dataRow, emptyRow, headerRow, resolveOptions, tableOpenTag, titleRow } from './markup';
import { validateTableOptions } from './validator';

export class HtmlTableWriter {
  readonly validation: TableValidationResult;
  private readonly options: ResolvedTableOptions;
  private readonly parts: string[] = [];
  private columns: string[] | undefined;
  private rowIndex = 0;
  private output: string | undefined;

  /**
   * @throws TableConfigurationError if the options or rules are invalid
   */
  constructor(
    options: HtmlTableOptions = {},
    columns?: readonly string[],
    cellFormatting?: readonly CellFormattingRule[]
  ) {
    this.validation = validateTableOptions(options, columns, cellFormatting);

    if (!this.validation.valid) {
      throw new TableConfigurationError(
        `Invalid table configuration: ${this.validation.errors.join('; ')}`,
        this.validation.errors,
        this.validation.warnings
      );
    }

    this.options = resolveOptions(options, columns, cellFormatting);
  }

  /** Data rows written so far */
  get rowCount(): number {
    return this.rowIndex;
  }

  /** Resolved columns, undefined until the first record arrives */
  get resolvedColumns(): readonly string[] | undefined {
    return this.columns;
  }

  write(record: TableRecord): this {
    if (this.output !== undefined) {
      throw new Error('HtmlTableWriter: write() called after end()');
    }

    if (this.columns === undefined) {
      this.columns = resolveColumns(record, this.options.columns);
      this.open(this.columns.length);
      this.parts.push(headerRow(this.columns, this.options));
    }

    this.parts.push(dataRow(record, this.columns, this.rowIndex, this.options));
    this.rowIndex++;
    return this;
  }

  /**
   * Close the table and return the markup. Repeated calls return the same string.
   */
  end(): string {
    if (this.output !== undefined) {
      return this.output;
    }

    if (this.columns === undefined) {
      this.open(1);
      this.parts.push(emptyRow(this.options));
    }

    this.parts.push('</table>');
    this.output = this.parts.join('');
    return this.output;
  }

  private open(columnCount: number): void {
    this.parts.push(tableOpenTag(this.options));

    if (this.options.title) {
      this.parts.push(titleRow(this.options.title, columnCount, this.options));
    }
  }
}
