/**
 * HTML Table Markup
 *
 * Emits the individual fragments of a table: the opening tag, title,
 * header, empty-state and data rows. Values are written as-is, unescaped.
 */

import { format, isValid } from 'date-fns';
import type {
  CellFormattingRule,
  HtmlTableOptions,
  RecordValue,
  ResolvedTableOptions,
  TableRecord,
} from './types';
import { fieldValue, legacyAttributesFor } from './records';

/**
 * Text color of the empty-state message
 */
export const EMPTY_STATE_COLOR = '#31708f';

/**
 * Default render options
 */
export const DEFAULT_OPTIONS = {
  emptyMessage: 'No records',
  tableStyleDefault: 'font-family:Verdana, Arial, sans-serif;font-size:12px;border-collapse:collapse',
  titleBackground: '#1f4e79',
  titleForeground: '#ffffff',
  headerBackground: '#d9e1f2',
  headerForeground: '#000000',
  rowBackgroundA: '#ffffff',
  rowBackgroundB: '#f2f2f2',
  legacyAttributes: false,
  dateFormat: 'yyyy-MM-dd HH:mm:ss',
} as const;

type Parity = 'even' | 'odd';

/**
 * Apply defaults. Positional columns and rules win over the ones in options.
 */
export function resolveOptions(
  options: HtmlTableOptions,
  columns?: readonly string[],
  cellFormatting?: readonly CellFormattingRule[]
): ResolvedTableOptions {
  return {
    title: options.title,
    columns: columns ?? options.columns,
    emptyMessage: options.emptyMessage ?? DEFAULT_OPTIONS.emptyMessage,
    tableStyleDefault: options.tableStyleDefault ?? DEFAULT_OPTIONS.tableStyleDefault,
    tableStyleOverride: options.tableStyleOverride,
    titleBackground: options.titleBackground ?? DEFAULT_OPTIONS.titleBackground,
    titleForeground: options.titleForeground ?? DEFAULT_OPTIONS.titleForeground,
    headerBackground: options.headerBackground ?? DEFAULT_OPTIONS.headerBackground,
    headerForeground: options.headerForeground ?? DEFAULT_OPTIONS.headerForeground,
    rowBackgroundA: options.rowBackgroundA ?? DEFAULT_OPTIONS.rowBackgroundA,
    rowBackgroundB: options.rowBackgroundB ?? DEFAULT_OPTIONS.rowBackgroundB,
    cellFormattingRules: cellFormatting ?? options.cellFormattingRules ?? [],
    legacyAttributes: options.legacyAttributes ?? DEFAULT_OPTIONS.legacyAttributes,
    dateFormat: options.dateFormat ?? DEFAULT_OPTIONS.dateFormat,
  };
}

/**
 * String form of a cell value
 */
export function formatValue(value: RecordValue | undefined, dateFormat: string): string {
  if (value === null || value === undefined) {
    return '';
  }

  if (value instanceof Date) {
    return isValid(value) ? format(value, dateFormat) : String(value);
  }

  return String(value);
}

/**
 * Opening <table> tag; the override is appended to the default style
 */
export function tableOpenTag(options: ResolvedTableOptions): string {
  const style = [options.tableStyleDefault, options.tableStyleOverride]
    .map(part => (part ?? '').trim().replace(/;+$/, ''))
    .filter(part => part.length > 0)
    .join(';');

  return style ? `<table style="${style}">` : '<table>';
}

export function titleRow(title: string, columnCount: number, options: ResolvedTableOptions): string {
  const span = Math.max(1, columnCount);
  const style =
    `background-color:${options.titleBackground};color:${options.titleForeground};` +
    'text-align:center;font-weight:bold;';

  return `<tr><td colspan="${span}" style="${style}">${title}</td></tr>`;
}

export function headerRow(columns: readonly string[], options: ResolvedTableOptions): string {
  const style =
    `background-color:${options.headerBackground};color:${options.headerForeground};` +
    'text-align:center;font-weight:bold;';
  const cells = columns.map(column => `<td style="${style}">${column}</td>`);

  return `<tr>${cells.join('')}</tr>`;
}

export function emptyRow(options: ResolvedTableOptions): string {
  return `<tr><td style="color:${EMPTY_STATE_COLOR};text-align:center;">${options.emptyMessage}</td></tr>`;
}

function ruleMatches(rule: CellFormattingRule, parity: Parity, column: string): boolean {
  const row = rule.row ?? 'any';
  if (row !== 'any' && row !== parity) return false;
  return rule.column === undefined || rule.column === column;
}

function renderCell(
  record: TableRecord,
  column: string,
  parity: Parity,
  options: ResolvedTableOptions
): string {
  const value = fieldValue(record, column);
  const attributes: string[] = [];
  let style = '';
  let aligned = false;

  if (options.legacyAttributes) {
    for (const attribute of legacyAttributesFor(record, column)) {
      const text = formatValue(attribute.value, options.dateFormat);
      const name = attribute.name.toLowerCase();

      // merged into the rule style below instead of a second style attribute
      if (name === 'style') {
        if (/text-align\s*:/i.test(text)) aligned = true;
        const trimmed = text.trim();
        if (trimmed) style += trimmed.endsWith(';') ? trimmed : `${trimmed};`;
        continue;
      }

      if (name === 'align') aligned = true;
      attributes.push(` ${attribute.name}="${text}"`);
    }
  }

  for (const rule of options.cellFormattingRules) {
    if (!ruleMatches(rule, parity, column)) continue;
    style += `${rule.property}:${rule.value};`;
    if (rule.property.trim().toLowerCase() === 'text-align') aligned = true;
  }

  if (!aligned && typeof value !== 'string') {
    attributes.push(' align="center"');
  }

  if (style) {
    attributes.push(` style="${style}"`);
  }

  return `<td${attributes.join('')}>${formatValue(value, options.dateFormat)}</td>`;
}

/**
 * Render one data row; parity comes from the zero-based row index
 */
export function dataRow(
  record: TableRecord,
  columns: readonly string[],
  rowIndex: number,
  options: ResolvedTableOptions
): string {
  const parity: Parity = rowIndex % 2 === 0 ? 'even' : 'odd';
  const background = parity === 'even' ? options.rowBackgroundA : options.rowBackgroundB;
  const cells = columns.map(column => renderCell(record, column, parity, options));

  return `<tr style="background-color:${background};">${cells.join('')}</tr>`;
}
