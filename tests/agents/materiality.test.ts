import { describe, expect, it } from "vitest";

import { classifyQuadrant, MaterialityAgent } from "../../src/agents/materiality";
import { StakeholderAnalysisAgent } from "../../src/agents/stakeholder_analysis";
import { StageExecutionError } from "../../src/errors";
import { citationKey } from "../../src/guidelines/mapping";
import type { EnterpriseInput } from "../../src/schemas/enterprise_input";
import { ACME_INPUT, templateDependencies, viewOf } from "../helpers/fixtures";

async function materialityFor(input: EnterpriseInput) {
  const stakeholders = await new StakeholderAnalysisAgent(templateDependencies()).execute(viewOf(input));
  return new MaterialityAgent(templateDependencies()).execute(viewOf(input, [stakeholders]));
}

describe("MaterialityAgent", () => {
  it("classifies quadrants at a threshold of 4", () => {
    expect(classifyQuadrant(4, 4)).toBe("high-impact-high-relevance");
    expect(classifyQuadrant(4.7, 3.9)).toBe("high-impact");
    expect(classifyQuadrant(3.8, 4.2)).toBe("high-relevance");
    expect(classifyQuadrant(3.5, 3.9)).toBe("moderate");
  });

  it("scores base and sector topics for a manufacturer", async () => {
    const artifact = await materialityFor(ACME_INPUT);

    expect(
      artifact.payload.topics.map((topic) => [
        topic.id,
        topic.impact_score,
        topic.stakeholder_relevance_score,
        topic.quadrant,
        topic.material,
      ]),
    ).toEqual([
      ["governance", 4.5, 5, "high-impact-high-relevance", true],
      ["climate", 4.7, 4.3, "high-impact-high-relevance", true],
      ["workforce", 4, 4.5, "high-impact-high-relevance", true],
      ["supply_chain", 3.8, 4.2, "high-relevance", true],
      ["community", 3.5, 3.9, "moderate", false],
      ["circular_economy", 4.3, 4.1, "high-impact-high-relevance", true],
    ]);
    expect(artifact.payload.quadrants).toEqual({
      "high-impact-high-relevance": ["governance", "climate", "workforce", "circular_economy"],
      "high-impact": [],
      "high-relevance": ["supply_chain"],
      moderate: ["community"],
    });
    expect(artifact.payload.summary).toBe("5 of 6 topics are material for Acme Co in 2024.");
  });

  it("drops relevance by one when no linked stakeholder group was identified", async () => {
    const artifact = await materialityFor({ name: "Pixel Labs", sector: "Software", period: "2024" });
    const community = artifact.payload.topics.find((topic) => topic.id === "community");

    expect(community?.stakeholder_relevance_score).toBe(2.9);
    expect(community?.stakeholder_groups).toEqual([]);
  });

  it("annotates topics with guideline citations and keeps unmapped categories empty", async () => {
    const artifact = await materialityFor(ACME_INPUT);
    const byId = new Map(artifact.payload.topics.map((topic) => [topic.id, topic.citations.map(citationKey)]));

    expect(byId.get("climate")).toEqual(["disclosure-guide:5.3", "GRI:305"]);
    expect(byId.get("circular_economy")).toEqual([]);
    expect(artifact.citations.map(citationKey)).toEqual([
      "disclosure-guide:2.1",
      "GRI:2-9",
      "disclosure-guide:5.3",
      "GRI:305",
      "GRI:403",
      "disclosure-guide:6.1",
      "disclosure-guide:7.4",
      "GRI:413",
    ]);
  });

  it("adds responsible investment for financial sectors", async () => {
    const artifact = await materialityFor({ name: "Harbor Trust", sector: "Insurance", period: "2024" });
    expect(artifact.payload.topics.map((topic) => topic.id)).toContain("responsible_investment");
  });

  it("fails when the stakeholder artifact is missing", async () => {
    const agent = new MaterialityAgent(templateDependencies());

    const error = await agent.execute(viewOf(ACME_INPUT)).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(StageExecutionError);
    expect(error).toHaveProperty("message", "Materiality: missing upstream artifact StakeholderAnalysis");
  });
});
