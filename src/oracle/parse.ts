import { OracleError } from "../errors.js";
import {
  HoldingReviewSchema,
  OracleEnvelopeSchema,
  OracleEvaluationSchema,
} from "./schema.js";
import type { HoldingAssessment, OracleBatch, OracleOutcome } from "./types.js";

export interface ParsedOracleResponse {
  outcomes: Map<string, OracleOutcome>;
  reviews: Map<string, HoldingAssessment>;
  callError: OracleError | null;
}

/** Every candidate in the batch gets the same error. */
export function failAll(batch: OracleBatch, error: OracleError): ParsedOracleResponse {
  const outcomes = new Map<string, OracleOutcome>();
  for (const c of batch.candidates) {
    outcomes.set(c.signal.id, {
      ok: false,
      error: new OracleError(error.message, c.signal.id, { cause: error }),
    });
  }
  return { outcomes, reviews: new Map(), callError: error };
}

/**
 * Strictly validate raw oracle text against the batch it answers.
 * Non-JSON or a bad envelope fails every signal; a bad or missing item
 * fails only its own signal. Nothing is salvaged from free text.
 */
export function parseOracleResponse(raw: string, batch: OracleBatch): ParsedOracleResponse {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e: unknown) {
    return failAll(batch, new OracleError("Oracle response is not valid JSON", null, { cause: e }));
  }

  const envelope = OracleEnvelopeSchema.safeParse(json);
  if (!envelope.success) {
    return failAll(batch, new OracleError(`Oracle envelope invalid: ${envelope.error.message}`));
  }

  const expected = new Set(batch.candidates.map((c) => c.signal.id));
  const outcomes = new Map<string, OracleOutcome>();

  for (const item of envelope.data.evaluations) {
    const parsed = OracleEvaluationSchema.safeParse(item);
    if (!parsed.success) {
      // Attribute the failure if the item at least names a known signal.
      const id = namedSignalId(item);
      if (id && expected.has(id) && !outcomes.has(id)) {
        outcomes.set(id, {
          ok: false,
          error: new OracleError(`Evaluation for ${id} failed validation: ${parsed.error.message}`, id),
        });
      }
      continue;
    }
    const e = parsed.data;
    if (!expected.has(e.signal_id)) continue;
    if (outcomes.has(e.signal_id)) {
      outcomes.set(e.signal_id, {
        ok: false,
        error: new OracleError(`Duplicate evaluation for ${e.signal_id}`, e.signal_id),
      });
      continue;
    }
    outcomes.set(e.signal_id, {
      ok: true,
      verdict: {
        signalId: e.signal_id,
        recommendation: e.recommendation,
        conviction: e.conviction,
        thesis: e.thesis,
        riskFactors: e.risk_factors,
        sizingHint: e.sizing_hint ?? null,
      },
    });
  }

  for (const id of expected) {
    if (!outcomes.has(id)) {
      outcomes.set(id, { ok: false, error: new OracleError(`No evaluation returned for ${id}`, id) });
    }
  }

  const reviews = new Map<string, HoldingAssessment>();
  const holdings = new Set(batch.holdings.map((h) => h.contractSymbol));
  for (const item of envelope.data.reviews ?? []) {
    const parsed = HoldingReviewSchema.safeParse(item);
    if (!parsed.success || !holdings.has(parsed.data.contract_symbol)) continue;
    reviews.set(parsed.data.contract_symbol, {
      contractSymbol: parsed.data.contract_symbol,
      conviction: parsed.data.conviction,
      thesisIntact: parsed.data.thesis_intact,
      note: parsed.data.note ?? null,
    });
  }

  return { outcomes, reviews, callError: null };
}

function namedSignalId(item: unknown): string | null {
  if (item && typeof item === "object" && "signal_id" in item && typeof item.signal_id === "string") {
    return item.signal_id;
  }
  return null;
}
