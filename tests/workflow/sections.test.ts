import { describe, expect, it } from "vitest";

import { NotFoundError } from "../../src/errors";
import { getPackageSection, hasPackageSection } from "../../src/workflow/sections";
import { ACME_INPUT, runTemplateStages } from "../helpers/fixtures";

async function acmePackage() {
  return { package_id: "pkg-test-1", artifacts: await runTemplateStages(ACME_INPUT) };
}

describe("package sections", () => {
  it("resolves stage and sub-section references", async () => {
    const pkg = await acmePackage();

    expect(hasPackageSection(pkg, "Materiality")).toBe(true);
    expect(hasPackageSection(pkg, "Materiality/climate")).toBe(true);
    expect(hasPackageSection(pkg, "Materiality/space")).toBe(false);
    expect(hasPackageSection(pkg, "Materiality/climate/extra")).toBe(false);
    expect(hasPackageSection(pkg, "Unknown")).toBe(false);
    expect(hasPackageSection(pkg, "")).toBe(false);
  });

  it("does not resolve stages a partial package never produced", async () => {
    const pkg = await acmePackage();
    const partial = { artifacts: pkg.artifacts.slice(0, 2) };

    expect(hasPackageSection(partial, "PolicyBenchmark")).toBe(false);
    expect(hasPackageSection(partial, "Materiality/governance")).toBe(true);
  });

  it("returns the typed artifact for a stage", async () => {
    const pkg = await acmePackage();

    const report = getPackageSection(pkg, "ReportCompiler");

    expect(report.payload.title).toBe("Acme Co 2024 ESG Report (Draft)");
  });

  it("throws NotFoundError for an unknown stage", async () => {
    const pkg = await acmePackage();

    expect(() => getPackageSection(pkg, "Summary")).toThrow(NotFoundError);
    expect(() => getPackageSection({ ...pkg, artifacts: [] }, "Materiality")).toThrow(
      "Package pkg-test-1 has no Materiality section",
    );
  });
});
