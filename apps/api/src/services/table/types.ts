/**
 * HTML Table Types
 *
 * Internal types for table rendering and validation.
 * Public types are re-exported from @record-table/shared.
 */

import type {
  RecordValue,
  TableRecord,
  RowSelector,
  CellFormattingRule,
  HtmlTableOptions,
  TableValidationResult,
} from '@record-table/shared';

// Re-export shared types for convenience
export type {
  RecordValue,
  TableRecord,
  RowSelector,
  CellFormattingRule,
  HtmlTableOptions,
  TableValidationResult,
};

/**
 * Options after defaults are applied
 */
export type ResolvedTableOptions = Required<
  Omit<HtmlTableOptions, 'title' | 'columns' | 'tableStyleOverride'>
> &
  Pick<HtmlTableOptions, 'title' | 'columns' | 'tableStyleOverride'>;

/**
 * Table rendering result
 */
export interface HtmlTableRenderResult {
  /** The rendered <table> markup, empty when validation failed */
  output: string;
  /** Whether rendering succeeded */
  success: boolean;
  /** Validation result */
  validation: TableValidationResult;
}

/**
 * Everything a render call needs, as accumulated by the builder
 */
export interface HtmlTableInput {
  records: TableRecord[];
  options: HtmlTableOptions;
  columns?: readonly string[];
  cellFormatting?: readonly CellFormattingRule[];
}

/**
 * Builder pattern for creating tables programmatically
 */
export interface HtmlTableBuilder {
  /** Set the title row text */
  title(title: string): HtmlTableBuilder;
  /** Set the explicit column order */
  columns(...names: string[]): HtmlTableBuilder;
  /** Merge render options */
  options(options: HtmlTableOptions): HtmlTableBuilder;
  /** Add a cell formatting rule */
  format(rule: CellFormattingRule): HtmlTableBuilder;
  /** Add one record */
  record(record: TableRecord): HtmlTableBuilder;
  /** Add several records */
  records(records: Iterable<TableRecord>): HtmlTableBuilder;
  /** Return the accumulated input */
  build(): HtmlTableInput;
  /** Validate and render to HTML */
  render(): string;
}

/**
 * Thrown when render options or formatting rules are invalid
 */
export class TableConfigurationError extends Error {
  constructor(
    message: string,
    public issues: string[],
    public warnings: string[] = []
  ) {
    super(message);
    this.name = 'TableConfigurationError';
  }
}
