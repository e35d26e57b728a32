/**
 * HTML Table Builder
 *
 * Fluent API for assembling a table from records, columns and rules.
 */

import type {
  CellFormattingRule,
  HtmlTableBuilder,
  HtmlTableInput,
  HtmlTableOptions,
  TableRecord,
} from './types';
import { renderHtmlTable } from './renderer';

/**
 * Create a new table builder
 *
 * @example
 * ```typescript
 * const html = createHtmlTable()
 *   .title('Nightly Jobs')
 *   .columns('job', 'duration')
 *   .format({ column: 'duration', property: 'text-align', value: 'right' })
 *   .record({ job: 'backup', duration: 42, host: 'db-1' })
 *   .record({ job: 'reindex', duration: 7, host: 'db-2' })
 *   .render();
 * ```
 */
export function createHtmlTable(): HtmlTableBuilder {
  const rows: TableRecord[] = [];
  const rules: CellFormattingRule[] = [];
  let tableOptions: HtmlTableOptions = {};
  let columnOrder: string[] | undefined;

  const builder: HtmlTableBuilder = {
    title(title: string) {
      tableOptions = { ...tableOptions, title };
      return builder;
    },

    columns(...names: string[]) {
      columnOrder = names;
      return builder;
    },

    options(options: HtmlTableOptions) {
      tableOptions = { ...tableOptions, ...options };
      return builder;
    },

    format(rule: CellFormattingRule) {
      rules.push(rule);
      return builder;
    },

    record(record: TableRecord) {
      rows.push(record);
      return builder;
    },

    records(records: Iterable<TableRecord>) {
      for (const record of records) {
        rows.push(record);
      }
      return builder;
    },

    build(): HtmlTableInput {
      return {
        records: [...rows],
        options: { ...tableOptions },
        columns: columnOrder,
        // rules added with format() replace options.cellFormattingRules
        cellFormatting: rules.length > 0 ? [...rules] : undefined,
      };
    },

    render(): string {
      const input = builder.build();
      return renderHtmlTable(input.records, input.options, input.columns, input.cellFormatting);
    },
  };

  return builder;
}
