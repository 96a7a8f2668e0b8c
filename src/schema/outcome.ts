import { z } from 'zod';

// ── SearchOutcome ─────────────────────────────────────────────

export const driverErrorKindSchema = z.enum([
  'timeout',
  'session_fault',
  'element_not_found',
  'other',
]);

export type DriverErrorKind = z.infer<typeof driverErrorKindSchema>;

export const searchOutcomeSchema = z.object({
  success: z.boolean(),
  /** Result page URL, `timeout`, or `error: <message>`. */
  locator: z.string().min(1),
  /** Seconds from the start of the search to success or failure. */
  executionTime: z.number().nonnegative(),
  errorKind: driverErrorKindSchema.optional(),
});

export type SearchOutcome = Readonly<z.infer<typeof searchOutcomeSchema>>;

// ── RunLog row ────────────────────────────────────────────────

export const responseStatusSchema = z.enum(['success', 'failed']);

export type ResponseStatus = z.infer<typeof responseStatusSchema>;

export const runLogRowSchema = z.object({
  timestamp: z.string().datetime(),
  query: z.string().min(1),
  locator: z.string().min(1),
  status: responseStatusSchema,
  executionTime: z.number().nonnegative(),
  category: z.string().min(1),
  queryType: z.string().min(1),
});

export type RunLogRow = z.infer<typeof runLogRowSchema>;

// ── RunSummary ────────────────────────────────────────────────

export const exitReasonSchema = z.enum(['completed', 'interrupted', 'fatal']);

export type ExitReason = z.infer<typeof exitReasonSchema>;

export const runSummarySchema = z.object({
  plannedCycles: z.number().int().positive(),
  successful: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  /** Percentage of attempted cycles that succeeded, 0 when none ran. */
  successRate: z.number().min(0).max(100),
  durationMs: z.number().int().nonnegative(),
  exitReason: exitReasonSchema,
  fatalError: z.string().optional(),
});

export type RunSummary = z.infer<typeof runSummarySchema>;
