import { z } from "zod";

export const DEFAULT_TOP_N = 10;
export const DEFAULT_CALLOUT_MIN_ACTIONS = 10;
export const DEFAULT_CALLOUT_LIMIT = 8;
export const DEFAULT_REPORT_TITLE = "Housekeeping & Room Usage Report";

// Lower edges of the Low / Moderate / High rotation bands
export const RotationBandsSchema = z
  .object({
    low: z.number().min(0).max(1).default(0.2),
    moderate: z.number().min(0).max(1).default(0.4),
    high: z.number().min(0).max(1).default(0.6),
  })
  .refine((b) => b.low <= b.moderate && b.moderate <= b.high, {
    message: "rotation band edges must be ascending",
  });

export type RotationBands = z.infer<typeof RotationBandsSchema>;

const toTopN = z
  .union([z.number(), z.string()])
  .transform((v) => {
    if (typeof v === "number") return v;
    const s = v.trim();
    return s === "" ? Number.NaN : Number(s);
  })
  .transform((n) => (Number.isFinite(n) ? Math.max(1, Math.floor(n)) : DEFAULT_TOP_N));

export const ReportConfigSchema = z.object({
  title: z.string().min(1).default(DEFAULT_REPORT_TITLE),
  topN: toTopN.default(DEFAULT_TOP_N),
  bands: RotationBandsSchema.default({}),
  calloutMinActions: z.number().int().min(0).default(DEFAULT_CALLOUT_MIN_ACTIONS),
  calloutLimit: z.number().int().min(1).default(DEFAULT_CALLOUT_LIMIT),
});

export type ReportConfig = z.infer<typeof ReportConfigSchema>;
export type ReportConfigInput = z.input<typeof ReportConfigSchema>;

export function resolveConfig(input: ReportConfigInput = {}): ReportConfig {
  return ReportConfigSchema.parse(input);
}
