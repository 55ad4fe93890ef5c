import { beforeEach, describe, expect, it, vi } from "vitest";

const mocks = vi.hoisted(() => ({
  query: vi.fn(),
  clientQuery: vi.fn(),
}));

vi.mock("../../src/store/postgres/client", () => ({
  ensureSchema: vi.fn(),
  closePool: vi.fn(),
  query: mocks.query,
  withTransaction: async (task: (client: { query: typeof mocks.clientQuery }) => Promise<unknown>) =>
    task({ query: mocks.clientQuery }),
}));

import { NotFoundError, PersistenceError } from "../../src/errors";
import type { ReportPackage } from "../../src/schemas/report_package";
import {
  appendPackageConfirmation,
  getPackage,
  insertPackage,
  listPackageSummaries,
} from "../../src/store/postgres/packages";
import { EsgWorkflowEngine } from "../../src/workflow/esg_workflow";
import { ACME_INPUT, templateAgents } from "../helpers/fixtures";

const DRAFT = {
  entry_id: "conf-1",
  package_id: "pkg-acme",
  section: "Materiality",
  acknowledged: true,
  comment: "ok",
  recorded_at: "2025-03-02T10:00:00.000Z",
};

async function acmePackage(): Promise<ReportPackage> {
  return new EsgWorkflowEngine({
    agents: templateAgents(),
    createPackageId: () => "pkg-acme",
    now: () => new Date("2025-03-01T09:30:00.000Z"),
  }).run(ACME_INPUT);
}

describe("store/postgres/packages", () => {
  beforeEach(() => {
    mocks.query.mockReset();
    mocks.clientQuery.mockReset();
  });

  it("inserts the package document without confirmations", async () => {
    mocks.clientQuery.mockResolvedValueOnce({ rows: [], rowCount: 1 });
    const pkg = await acmePackage();

    await expect(insertPackage(pkg)).resolves.toBe(true);

    const [sql, values] = mocks.clientQuery.mock.calls[0] ?? [];
    expect(sql).toContain("ON CONFLICT (package_id) DO NOTHING");
    expect(values.slice(0, 5)).toEqual(["pkg-acme", 1, "complete", null, "2025-03-01T09:30:00.000Z"]);
    expect(JSON.parse(values[5] as string)).toEqual({ ...pkg, confirmations: [] });
  });

  it("reports an existing id as not inserted", async () => {
    mocks.clientQuery.mockResolvedValueOnce({ rows: [], rowCount: 0 });

    await expect(insertPackage(await acmePackage())).resolves.toBe(false);
    expect(mocks.clientQuery).toHaveBeenCalledTimes(1);
  });

  it("returns null for an unknown package", async () => {
    mocks.query.mockResolvedValueOnce({ rows: [], rowCount: 0 });

    await expect(getPackage("pkg-missing")).resolves.toBeNull();
    expect(mocks.query).toHaveBeenCalledTimes(1);
  });

  it("reads the document and attaches confirmations in sequence order", async () => {
    const pkg = await acmePackage();
    mocks.query
      .mockResolvedValueOnce({ rows: [{ document: JSON.stringify(pkg) }], rowCount: 1 })
      .mockResolvedValueOnce({
        rows: [
          {
            ...DRAFT,
            sequence: "1",
            comment: null,
            recorded_at: new Date("2025-03-02T10:00:00.000Z"),
          },
        ],
        rowCount: 1,
      });

    const loaded = await getPackage("pkg-acme");

    expect(loaded?.artifacts).toEqual(pkg.artifacts);
    expect(loaded?.confirmations).toEqual([{ ...DRAFT, sequence: 1, comment: null }]);
    expect(mocks.query.mock.calls[1]?.[0]).toContain("ORDER BY sequence ASC");
  });

  it("refuses a stored document with an unknown schema version", async () => {
    mocks.query
      .mockResolvedValueOnce({ rows: [{ document: { schema_version: 7 } }], rowCount: 1 })
      .mockResolvedValueOnce({ rows: [], rowCount: 0 });

    await expect(getPackage("pkg-acme")).rejects.toThrow(new PersistenceError("Unsupported package schema version: 7"));
  });

  it("maps summary rows", async () => {
    mocks.query.mockResolvedValueOnce({
      rows: [{ package_id: "pkg-acme", status: "partial", created_at: new Date("2025-03-01T09:30:00.000Z") }],
      rowCount: 1,
    });

    await expect(listPackageSummaries()).resolves.toEqual([
      { package_id: "pkg-acme", status: "partial", created_at: "2025-03-01T09:30:00.000Z" },
    ]);
  });

  it("locks the package row before appending a confirmation", async () => {
    mocks.clientQuery.mockResolvedValueOnce({ rows: [{ package_id: "pkg-acme" }], rowCount: 1 }).mockResolvedValueOnce({
      rows: [{ ...DRAFT, sequence: 3, recorded_at: "2025-03-02T10:00:00.000Z" }],
      rowCount: 1,
    });

    const entry = await appendPackageConfirmation("pkg-acme", DRAFT);

    expect(entry).toEqual({ ...DRAFT, sequence: 3 });
    expect(mocks.clientQuery.mock.calls[0]?.[0]).toContain("FOR UPDATE");
    expect(mocks.clientQuery.mock.calls[1]?.[0]).toContain("COALESCE(MAX(sequence), 0) + 1");
    expect(mocks.clientQuery.mock.calls[1]?.[1]).toEqual([
      "conf-1",
      "pkg-acme",
      "Materiality",
      true,
      "ok",
      "2025-03-02T10:00:00.000Z",
    ]);
  });

  it("raises NotFoundError when the package row is missing", async () => {
    mocks.clientQuery.mockResolvedValueOnce({ rows: [], rowCount: 0 });

    await expect(appendPackageConfirmation("pkg-missing", DRAFT)).rejects.toBeInstanceOf(NotFoundError);
    expect(mocks.clientQuery).toHaveBeenCalledTimes(1);
  });
});
