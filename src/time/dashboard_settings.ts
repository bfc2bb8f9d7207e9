import { z } from 'zod';
import { timeConfig } from '../config';
import { InvalidDashboardSettingsError, InvalidExpressionError, InvalidIntervalError } from './errors';
import { normalizeRefresh } from './interval';
import { decodeStoredBoundary } from './range_codec';
import { TimeRange } from './types';

const storedBoundarySchema = z
  .union([z.string().min(1), z.number().int()])
  .transform((value, ctx) => {
    try {
      return decodeStoredBoundary(String(value));
    } catch (error) {
      if (error instanceof InvalidExpressionError) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.message });
        return z.NEVER;
      }
      throw error;
    }
  });

const refreshSchema = z
  .union([z.string(), z.literal(false), z.null()])
  .optional()
  .transform((value, ctx) => {
    try {
      return normalizeRefresh(value) ?? false;
    } catch (error) {
      if (error instanceof InvalidIntervalError) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.message });
        return z.NEVER;
      }
      throw error;
    }
  });

/**
 * The fields of a dashboard record this package reads. Other fields pass through untouched.
 */
export const dashboardSettingsSchema = z
  .object({
    uid: z.string().min(1).optional(),
    title: z.string().optional(),
    time: z
      .object({
        from: storedBoundarySchema,
        to: storedBoundarySchema,
      })
      .optional(),
    refresh: refreshSchema,
  })
  .passthrough();

export type DashboardSettingsInput = z.input<typeof dashboardSettingsSchema>;

export interface DashboardSettings {
  uid?: string;
  title?: string;
  time: TimeRange;
  /** Active interval literal, or false when auto-refresh is off. */
  refresh: string | false;
}

/**
 * Validates a dashboard record and decodes its saved time range. A record
 * without `time` gets the configured default range.
 *
 * @throws InvalidDashboardSettingsError listing every problem found.
 */
export function parseDashboardSettings(input: unknown): DashboardSettings {
  const result = dashboardSettingsSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidDashboardSettingsError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const { uid, title, time, refresh } = result.data;
  return {
    uid,
    title,
    time: time ?? {
      from: decodeStoredBoundary(timeConfig.defaultFrom),
      to: decodeStoredBoundary(timeConfig.defaultTo),
    },
    refresh,
  };
}
