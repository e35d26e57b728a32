/**
 * Table Option Validator
 *
 * Validates render options and formatting rules before rendering:
 * - Row selectors are one of any / odd / even
 * - Rules name a non-empty CSS property
 * - Date formats are accepted by date-fns
 *
 * Rules and columns that can never take effect are reported as warnings.
 */

import { format } from 'date-fns';
import { z } from 'zod';
import type { HtmlTableOptions, TableValidationResult } from './types';
import { LEGACY_ATTRIBUTE_PREFIX, isReservedField } from './records';

function isValidDateFormat(pattern: string): boolean {
  try {
    format(new Date(0), pattern);
    return true;
  } catch {
    return false;
  }
}

export const RowSelectorSchema = z.enum(['any', 'odd', 'even']);

export const CellFormattingRuleSchema = z.object({
  row: RowSelectorSchema.optional(),
  column: z.string().min(1, 'Column selector must not be empty').optional(),
  property: z.string().regex(/\S/, 'CSS property is required'),
  value: z.string(),
});

export const ColumnSpecSchema = z.array(z.string());

export const CellFormattingSchema = z.array(CellFormattingRuleSchema);

export const HtmlTableOptionsSchema = z.object({
  title: z.string().optional(),
  columns: ColumnSpecSchema.optional(),
  emptyMessage: z.string().optional(),
  tableStyleDefault: z.string().optional(),
  tableStyleOverride: z.string().optional(),
  titleBackground: z.string().optional(),
  titleForeground: z.string().optional(),
  headerBackground: z.string().optional(),
  headerForeground: z.string().optional(),
  rowBackgroundA: z.string().optional(),
  rowBackgroundB: z.string().optional(),
  cellFormattingRules: CellFormattingSchema.optional(),
  legacyAttributes: z.boolean().optional(),
  dateFormat: z
    .string()
    .min(1, 'Date format must not be empty')
    .refine(isValidDateFormat, 'Invalid date-fns format string')
    .optional(),
});

function formatIssues(error: z.ZodError, label: string): string[] {
  return error.issues.map(issue => {
    const path = [label, ...issue.path].join('.');
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate render options plus the optional positional columns and rules
 *
 * @returns Validation result with errors and warnings
 */
export function validateTableOptions(
  options: unknown,
  columns?: unknown,
  cellFormatting?: unknown
): TableValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const optionsResult = HtmlTableOptionsSchema.safeParse(options ?? {});
  if (!optionsResult.success) {
    errors.push(...formatIssues(optionsResult.error, 'options'));
  }

  const columnsResult = ColumnSpecSchema.optional().safeParse(columns);
  if (!columnsResult.success) {
    errors.push(...formatIssues(columnsResult.error, 'columns'));
  }

  const rulesResult = CellFormattingSchema.optional().safeParse(cellFormatting);
  if (!rulesResult.success) {
    errors.push(...formatIssues(rulesResult.error, 'cellFormatting'));
  }

  if (!optionsResult.success || !columnsResult.success || !rulesResult.success) {
    return { valid: false, errors, warnings };
  }

  const columnList = columnsResult.data ?? optionsResult.data.columns;
  const rules = rulesResult.data ?? optionsResult.data.cellFormattingRules ?? [];

  if (columnList) {
    for (const column of columnList) {
      if (isReservedField(column)) {
        warnings.push(
          `Column "${column}" uses the reserved "${LEGACY_ATTRIBUTE_PREFIX}" prefix and is never displayed`
        );
      }
    }

    rules.forEach((rule, index) => {
      if (rule.column !== undefined && !columnList.includes(rule.column)) {
        warnings.push(
          `Formatting rule ${index + 1}: column "${rule.column}" is not in the column list and never matches`
        );
      }
    });
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Check if a value is a valid options object (type guard)
 */
export function isValidTableOptions(value: unknown): value is HtmlTableOptions {
  if (!value || typeof value !== 'object') return false;
  return validateTableOptions(value).valid;
}
