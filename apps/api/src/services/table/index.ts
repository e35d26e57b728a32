/**
 * HTML Table Module
 *
 * Renders uniformly-shaped records into a styled HTML table for reports
 * and emails, with inline styles only.
 *
 * @example
 * ```typescript
 * import { renderHtmlTable, createHtmlTable, HtmlTableWriter } from './services/table';
 *
 * // Method 1: Direct render
 * const html = renderHtmlTable(
 *   [{ name: 'Alice', score: 95 }, { name: 'Bob', score: 87 }],
 *   { title: 'Scores' },
 *   ['score', 'name'],
 *   [{ row: 'odd', property: 'color', value: 'gray' }]
 * );
 *
 * // Method 2: Builder pattern
 * const built = createHtmlTable()
 *   .title('Scores')
 *   .record({ name: 'Alice', score: 95 })
 *   .render();
 *
 * // Method 3: Incremental
 * const writer = new HtmlTableWriter({ title: 'Scores' });
 * writer.write({ name: 'Alice', score: 95 });
 * const streamed = writer.end();
 * ```
 */

// Types
export type {
  RecordValue,
  TableRecord,
  RowSelector,
  CellFormattingRule,
  HtmlTableOptions,
  TableValidationResult,
  ResolvedTableOptions,
  HtmlTableRenderResult,
  HtmlTableInput,
  HtmlTableBuilder,
} from './types';
export { TableConfigurationError } from './types';

// Validation
export {
  validateTableOptions,
  isValidTableOptions,
  HtmlTableOptionsSchema,
  CellFormattingRuleSchema,
  CellFormattingSchema,
  ColumnSpecSchema,
  RowSelectorSchema,
} from './validator';

// Records
export {
  LEGACY_ATTRIBUTE_PREFIX,
  LEGACY_ATTRIBUTE_SEPARATOR,
  fieldNames,
  resolveColumns,
} from './records';

// Rendering
export { renderHtmlTable, safeRenderHtmlTable } from './renderer';
export { HtmlTableWriter } from './writer';
export { DEFAULT_OPTIONS, EMPTY_STATE_COLOR } from './markup';

// Builder utilities
export { createHtmlTable } from './builder';
