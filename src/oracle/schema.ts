import { z } from "zod";

export const RecommendationSchema = z.enum(["EXECUTE", "ALERT", "SKIP"]);
export type Recommendation = z.infer<typeof RecommendationSchema>;

export const OracleEvaluationSchema = z.object({
  signal_id: z.string().min(1),
  recommendation: RecommendationSchema,
  conviction: z.number().min(0).max(100),
  thesis: z.string().min(1).max(2000),
  risk_factors: z.array(z.string()),
  sizing_hint: z.string().nullable().optional(),
});

export const HoldingReviewSchema = z.object({
  contract_symbol: z.string().min(1),
  conviction: z.number().min(0).max(100),
  thesis_intact: z.boolean(),
  note: z.string().max(1000).optional(),
});

/** Envelope is strict; items are validated one by one so a bad item fails only its signal. */
export const OracleEnvelopeSchema = z.object({
  evaluations: z.array(z.unknown()),
  reviews: z.array(z.unknown()).optional(),
});

export type OracleEvaluation = z.infer<typeof OracleEvaluationSchema>;
export type HoldingReview = z.infer<typeof HoldingReviewSchema>;
