import { beforeEach, describe, expect, it, vi } from "vitest";

import { createEsgStageAgents } from "../../src/agents";
import { NotFoundError, ValidationError } from "../../src/errors";
import { ConfirmationLedger } from "../../src/ledger/confirmation_ledger";
import type { ReportPackage } from "../../src/schemas/report_package";
import { MemoryArchiveStore } from "../../src/store/archive";
import { EsgWorkflowEngine } from "../../src/workflow/esg_workflow";
import { ACME_INPUT, hangingStageClient, templateAgents } from "../helpers/fixtures";

let archive: MemoryArchiveStore;
let ledger: ConfirmationLedger;
let pkg: ReportPackage;
let entryCounter: number;

beforeEach(async () => {
  archive = new MemoryArchiveStore();
  await archive.open();
  entryCounter = 0;
  ledger = new ConfirmationLedger(archive, {
    now: () => new Date("2025-03-02T10:00:00.000Z"),
    createEntryId: () => {
      entryCounter += 1;
      return `conf-${entryCounter}`;
    },
  });

  pkg = await new EsgWorkflowEngine({ agents: templateAgents(), createPackageId: () => "pkg-acme" }).run(ACME_INPUT);
  await archive.persist(pkg);
});

describe("ConfirmationLedger", () => {
  it("appends confirmations in sequence", async () => {
    const first = await ledger.append("pkg-acme", { section: "Materiality", acknowledged: true, comment: "Looks right" });
    const second = await ledger.append("pkg-acme", { section: "Materiality/climate", acknowledged: false });

    expect(first).toEqual({
      entry_id: "conf-1",
      package_id: "pkg-acme",
      sequence: 1,
      section: "Materiality",
      acknowledged: true,
      comment: "Looks right",
      recorded_at: "2025-03-02T10:00:00.000Z",
    });
    expect(second.sequence).toBe(2);
    expect(second.comment).toBeNull();
    await expect(ledger.list("pkg-acme")).resolves.toEqual([first, second]);
  });

  it("keeps earlier entries when a later append names a missing section", async () => {
    await ledger.append("pkg-acme", { section: "Materiality", acknowledged: true });
    await ledger.append("pkg-acme", { section: "Materiality", acknowledged: false, comment: "Revisit water" });

    await expect(ledger.append("pkg-acme", { section: "Forecast", acknowledged: true })).rejects.toBeInstanceOf(
      ValidationError,
    );

    const stored = await archive.get("pkg-acme");
    expect(stored.confirmations.map((entry) => [entry.entry_id, entry.sequence, entry.comment])).toEqual([
      ["conf-1", 1, null],
      ["conf-2", 2, "Revisit water"],
    ]);
  });

  it("stores a blank comment as null", async () => {
    const entry = await ledger.append("pkg-acme", { section: " ReportCompiler ", acknowledged: true, comment: "   " });

    expect(entry.section).toBe("ReportCompiler");
    expect(entry.comment).toBeNull();
  });

  it("leaves the artifacts untouched", async () => {
    await ledger.append("pkg-acme", { section: "PeerBenchmark", acknowledged: true });

    const stored = await archive.get("pkg-acme");
    expect(stored.artifacts).toEqual(pkg.artifacts);
    expect(stored.confirmations).toHaveLength(1);
  });

  it("rejects a section the package does not have and records nothing", async () => {
    const error = await ledger
      .append("pkg-acme", { section: "Materiality/space", acknowledged: true })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toHaveProperty("message", 'Package pkg-acme has no section "Materiality/space"');
    await expect(ledger.list("pkg-acme")).resolves.toEqual([]);
  });

  it("rejects malformed input", async () => {
    const error = await ledger.append("pkg-acme", { section: "Materiality", acknowledged: "yes", extra: 1 }).catch(
      (caught: unknown) => caught,
    );

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toHaveProperty("issues", [
      "acknowledged: Expected boolean, received string",
      "Unrecognized key(s) in object: 'extra'",
    ]);
  });

  it("rejects stages a partial package never produced", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const partial = await new EsgWorkflowEngine({
      agents: createEsgStageAgents({ client: hangingStageClient("PeerBenchmark") }),
      stageTimeoutMs: 20,
      createPackageId: () => "pkg-partial",
    }).run(ACME_INPUT);
    await archive.persist(partial);

    await expect(ledger.append("pkg-partial", { section: "PeerBenchmark", acknowledged: true })).rejects.toBeInstanceOf(
      ValidationError,
    );
    await expect(
      ledger.append("pkg-partial", { section: "PolicyBenchmark", acknowledged: true }),
    ).resolves.toHaveProperty("sequence", 1);
  });

  it("reports an unknown package as not found", async () => {
    await expect(ledger.append("pkg-missing", { section: "Materiality", acknowledged: true })).rejects.toBeInstanceOf(
      NotFoundError,
    );
    await expect(ledger.list("pkg-missing")).rejects.toThrow("Package pkg-missing not found");
  });

  it("serializes concurrent appends into distinct sequence numbers", async () => {
    const entries = await Promise.all(
      Array.from({ length: 5 }, () => ledger.append("pkg-acme", { section: "Materiality", acknowledged: true })),
    );

    expect(entries.map((entry) => entry.sequence).sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5]);
  });
});
