import { describe, expect, it } from "vitest";

import { loadStagePrompt, renderTemplate } from "../../src/agents/base_utils/prompts";

describe("renderTemplate", () => {
  it("substitutes every placeholder in one pass", () => {
    expect(
      renderTemplate("Enterprise: {enterprise_name} ({sector})", {
        enterprise_name: "{sector} Holdings",
        sector: "Energy",
      }),
    ).toBe("Enterprise: {sector} Holdings (Energy)");
  });

  it("leaves unknown placeholders as written", () => {
    expect(renderTemplate("{stage} {missing} {constructor}", { stage: "Materiality" })).toBe(
      "Materiality {missing} {constructor}",
    );
  });

  it("renders the stage prompt with the facts block last", () => {
    const prompt = loadStagePrompt("PeerBenchmark");

    expect(
      renderTemplate(prompt.userTemplate, {
        enterprise_name: "Acme Co",
        sector: "Manufacturing",
        period: "2024",
        stage: "PeerBenchmark",
        facts_json: '{"headline":"h","points":[]}',
      }),
    ).toBe(
      'Enterprise: Acme Co (Manufacturing), reporting period 2024.\nSTAGE: PeerBenchmark\nFACTS_JSON:\n{"headline":"h","points":[]}',
    );
  });
});
