import { describe, it, expect } from "vitest";
import { parseOracleResponse } from "../parse.js";
import { buildUserPrompt, hashPrompt } from "../prompt.js";
import { evaluation, makeBatch } from "./fixtures.js";

describe("parseOracleResponse", () => {
  it("maps every valid evaluation onto its signal", () => {
    const raw = JSON.stringify({ evaluations: [evaluation("sig-1"), { ...evaluation("sig-2", 40), recommendation: "SKIP" }] });
    const parsed = parseOracleResponse(raw, makeBatch());
    expect(parsed.callError).toBeNull();
    expect(parsed.outcomes.get("sig-1")).toEqual({
      ok: true,
      verdict: {
        signalId: "sig-1",
        recommendation: "EXECUTE",
        conviction: 85,
        thesis: "Aggressive opening call buying",
        riskFactors: ["macro"],
        sizingHint: null,
      },
    });
    const second = parsed.outcomes.get("sig-2");
    expect(second?.ok && second.verdict.recommendation).toBe("SKIP");
  });

  it("fails the whole batch on non-JSON text", () => {
    const parsed = parseOracleResponse("I think you should buy", makeBatch());
    expect(parsed.callError?.message).toBe("Oracle response is not valid JSON");
    expect([...parsed.outcomes.values()].every((o) => !o.ok)).toBe(true);
    expect(parsed.outcomes.size).toBe(2);
  });

  it("fails the whole batch on a bad envelope", () => {
    const parsed = parseOracleResponse(JSON.stringify({ verdicts: [] }), makeBatch());
    expect(parsed.callError).not.toBeNull();
    expect(parsed.outcomes.get("sig-1")?.ok).toBe(false);
  });

  it("fails only the signal whose item is invalid", () => {
    const raw = JSON.stringify({ evaluations: [evaluation("sig-1"), { ...evaluation("sig-2"), conviction: 140 }] });
    const parsed = parseOracleResponse(raw, makeBatch());
    expect(parsed.outcomes.get("sig-1")?.ok).toBe(true);
    const bad = parsed.outcomes.get("sig-2");
    expect(bad?.ok).toBe(false);
    expect(bad && !bad.ok && bad.error.signalId).toBe("sig-2");
  });

  it("fails missing and duplicated signals and ignores unknown ones", () => {
    const raw = JSON.stringify({
      evaluations: [evaluation("sig-1"), evaluation("sig-1", 90), evaluation("sig-9")],
    });
    const parsed = parseOracleResponse(raw, makeBatch());
    const dup = parsed.outcomes.get("sig-1");
    const missing = parsed.outcomes.get("sig-2");
    expect(dup && !dup.ok && dup.error.message).toBe("Duplicate evaluation for sig-1");
    expect(missing && !missing.ok && missing.error.message).toBe("No evaluation returned for sig-2");
    expect(parsed.outcomes.has("sig-9")).toBe(false);
  });

  it("keeps reviews only for held contracts", () => {
    const raw = JSON.stringify({
      evaluations: [evaluation("sig-1"), evaluation("sig-2")],
      reviews: [
        { contract_symbol: "MSFT250321C00400000", conviction: 35, thesis_intact: false, note: "Guidance cut" },
        { contract_symbol: "TSLA250321C00300000", conviction: 80, thesis_intact: true },
      ],
    });
    const parsed = parseOracleResponse(raw, makeBatch());
    expect([...parsed.reviews.values()]).toEqual([
      { contractSymbol: "MSFT250321C00400000", conviction: 35, thesisIntact: false, note: "Guidance cut" },
    ]);
  });
});

describe("prompt", () => {
  it("hashes identically for identical batches", () => {
    const a = buildUserPrompt(makeBatch());
    const b = buildUserPrompt(makeBatch());
    expect(hashPrompt("sys", a)).toBe(hashPrompt("sys", b));
    expect(hashPrompt("sys", a)).toHaveLength(16);
  });

  it("includes every candidate and holding", () => {
    const payload: unknown = JSON.parse(buildUserPrompt(makeBatch()));
    expect(payload).toMatchObject({
      candidates: [{ signal_id: "sig-1" }, { signal_id: "sig-2" }],
      holdings: [{ contract_symbol: "MSFT250321C00400000", entry_conviction: 84 }],
    });
  });
});
