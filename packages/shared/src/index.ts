// ============ Record Types ============

/**
 * Value of a single record field.
 * Strings render as text; everything else is treated as non-textual
 * (centered by default).
 */
export type RecordValue = string | number | boolean | Date | null;

/**
 * One input item, rendered as one table row.
 *
 * A `Map` keeps insertion order for every key. Plain objects keep their own
 * key order, except that integer-like keys are enumerated first.
 */
export type TableRecord =
  | ReadonlyMap<string, RecordValue>
  | Readonly<Record<string, RecordValue>>;

// ============ Formatting Types ============

/**
 * Which data rows a formatting rule applies to, by zero-based index parity
 */
export type RowSelector = 'any' | 'odd' | 'even';

/**
 * Declarative selector + CSS property/value applied to matching cells.
 * All matching rules accumulate in declaration order.
 */
export interface CellFormattingRule {
  /** Row parity to match (default: any) */
  row?: RowSelector;
  /** Field name to match (default: any column) */
  column?: string;
  /** CSS property name, e.g. "color" */
  property: string;
  /** CSS value, e.g. "red" */
  value: string;
}

/**
 * Options for HTML table rendering. Every option is independently overridable.
 */
export interface HtmlTableOptions {
  /** Title row text; omitted means no title row */
  title?: string;
  /** Explicit column order; omitted means the first record's field order */
  columns?: readonly string[];
  /** Message shown when there are no records */
  emptyMessage?: string;
  /** Base inline style of the <table> element */
  tableStyleDefault?: string;
  /** Appended to the base style, never replacing it */
  tableStyleOverride?: string;
  titleBackground?: string;
  titleForeground?: string;
  headerBackground?: string;
  headerForeground?: string;
  /** Background of even (0, 2, ...) data rows */
  rowBackgroundA?: string;
  /** Background of odd (1, 3, ...) data rows */
  rowBackgroundB?: string;
  cellFormattingRules?: readonly CellFormattingRule[];
  /**
   * Read `attr_<name>[__<column>]` fields as per-cell HTML attributes.
   * @deprecated Use cellFormattingRules instead
   */
  legacyAttributes?: boolean;
  /** date-fns format string used for Date values */
  dateFormat?: string;
}

// ============ Validation Types ============

/**
 * Result of table option validation
 */
export interface TableValidationResult {
  /** Whether the options are valid */
  valid: boolean;
  /** Error messages if invalid */
  errors: string[];
  /** Warnings (valid but potentially inert) */
  warnings: string[];
}

// ============ API Types ============

export interface RenderTableRequest {
  records: Array<Record<string, string | number | boolean | null>>;
  options?: HtmlTableOptions;
  columns?: string[];
  cellFormatting?: CellFormattingRule[];
}

export interface ApiErrorBody {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}
