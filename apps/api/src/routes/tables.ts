import { Hono } from 'hono';
import type { Context } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { ApiErrorBody, RenderTableRequest } from '@record-table/shared';
import {
  CellFormattingSchema,
  ColumnSpecSchema,
  HtmlTableOptionsSchema,
  safeRenderHtmlTable,
  validateTableOptions,
} from '../services/table';
import { getConfig, isLogLevelEnabled } from '../services/config';

const tables = new Hono();

// Validation schemas
const renderSchema = z.object({
  records: z.array(z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]))),
  options: HtmlTableOptionsSchema.optional(),
  columns: ColumnSpecSchema.optional(),
  cellFormatting: CellFormattingSchema.optional(),
});

// Configuration is checked by validateTableOptions, so the body is only required to be an object
const validateSchema = z.object({
  options: z.unknown().optional(),
  columns: z.unknown().optional(),
  cellFormatting: z.unknown().optional(),
});

function validationHook(
  result: { success: true } | { success: false; error: z.ZodError },
  c: Context
): Response | undefined {
  if (!result.success) {
    const body: ApiErrorBody = {
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Invalid table render request',
        details: result.error.issues.map(issue => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      },
    };
    return c.json(body, 400);
  }
  return undefined;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * POST /api/tables/render
 * Render records to an HTML table, layering request options over the configured theme
 */
tables.post('/render', zValidator('json', renderSchema, validationHook), (c) => {
  const request: RenderTableRequest = c.req.valid('json');
  const { records, options, columns, cellFormatting } = request;
  const merged = { ...getConfig().table, ...options };

  const result = safeRenderHtmlTable(records, merged, columns, cellFormatting);
  const { validation } = result;

  if (validation.warnings.length > 0 && isLogLevelEnabled('warn')) {
    console.warn(`[tables] ${validation.warnings.join('; ')}`);
  }

  if (!result.success) {
    const body: ApiErrorBody = {
      error: {
        code: 'INVALID_TABLE_CONFIG',
        message: 'Invalid table configuration',
        details: validation.errors,
      },
    };
    return c.json(body, 400);
  }

  if (isLogLevelEnabled('debug')) {
    console.debug(`[tables] Rendered ${records.length} record(s), ${result.output.length} chars`);
  }

  return c.html(result.output);
});

/**
 * POST /api/tables/validate
 * Report errors and inert rules without rendering
 */
tables.post('/validate', zValidator('json', validateSchema, validationHook), (c) => {
  const { options, columns, cellFormatting } = c.req.valid('json');
  const theme = getConfig().table;
  // non-object options are passed through so the validator reports them
  let merged: unknown = theme;
  if (isPlainObject(options)) {
    merged = { ...theme, ...options };
  } else if (options !== undefined) {
    merged = options;
  }

  return c.json(validateTableOptions(merged, columns, cellFormatting));
});

export { tables as tableRoutes };
