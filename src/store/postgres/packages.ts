import type { QueryResultRow } from "pg";

import { NotFoundError } from "../../errors";
import {
  type ConfirmationDraft,
  type ConfirmationEntry,
  type PackageSummary,
  packageStatusSchema,
  readPackageDocument,
  type ReportPackage,
} from "../../schemas/report_package";
import { query, withTransaction } from "./client";
import { type ConfirmationRow, confirmationFromRow, toIsoTimestamp, toJsonDocument } from "./serializers";

interface PackageRow extends QueryResultRow {
  document: unknown;
}

interface PackageSummaryRow extends QueryResultRow {
  package_id: string;
  status: string;
  created_at: Date | string;
}

interface ConfirmationQueryRow extends ConfirmationRow, QueryResultRow {}

const CONFIRMATION_COLUMNS = "entry_id, package_id, sequence, section, acknowledged, comment, recorded_at";

export async function insertPackage(pkg: ReportPackage): Promise<boolean> {
  return withTransaction(async (client) => {
    const inserted = await client.query(
      `
        INSERT INTO report_packages (package_id, schema_version, status, failed_stage, created_at, document)
        VALUES ($1, $2, $3, $4, $5, $6::jsonb)
        ON CONFLICT (package_id) DO NOTHING
      `,
      [
        pkg.package_id,
        pkg.schema_version,
        pkg.status,
        pkg.failure?.stage ?? null,
        pkg.created_at,
        JSON.stringify({ ...pkg, confirmations: [] }),
      ],
    );

    if ((inserted.rowCount ?? 0) === 0) {
      return false;
    }

    for (const entry of pkg.confirmations) {
      await client.query(
        `INSERT INTO package_confirmations (${CONFIRMATION_COLUMNS}) VALUES ($1, $2, $3, $4, $5, $6, $7)`,
        [
          entry.entry_id,
          pkg.package_id,
          entry.sequence,
          entry.section,
          entry.acknowledged,
          entry.comment,
          entry.recorded_at,
        ],
      );
    }

    return true;
  });
}

export async function getPackage(packageId: string): Promise<ReportPackage | null> {
  const result = await query<PackageRow>("SELECT document FROM report_packages WHERE package_id = $1", [packageId]);
  const row = result.rows[0];
  if (!row) {
    return null;
  }

  const confirmations = await query<ConfirmationQueryRow>(
    `SELECT ${CONFIRMATION_COLUMNS} FROM package_confirmations WHERE package_id = $1 ORDER BY sequence ASC`,
    [packageId],
  );

  const pkg = readPackageDocument(toJsonDocument(row.document));
  return { ...pkg, confirmations: confirmations.rows.map(confirmationFromRow) };
}

export async function listPackageSummaries(): Promise<PackageSummary[]> {
  const result = await query<PackageSummaryRow>(
    "SELECT package_id, status, created_at FROM report_packages ORDER BY created_at DESC",
  );

  return result.rows.map((row) => ({
    package_id: row.package_id,
    status: packageStatusSchema.parse(row.status),
    created_at: toIsoTimestamp(row.created_at),
  }));
}

/** Row-locks the package so concurrent appends to it take sequence numbers one at a time. */
export async function appendPackageConfirmation(
  packageId: string,
  entry: ConfirmationDraft,
): Promise<ConfirmationEntry> {
  return withTransaction(async (client) => {
    const locked = await client.query("SELECT package_id FROM report_packages WHERE package_id = $1 FOR UPDATE", [
      packageId,
    ]);
    if ((locked.rowCount ?? 0) === 0) {
      throw new NotFoundError(`Package ${packageId} not found`);
    }

    const inserted = await client.query<ConfirmationQueryRow>(
      `
        INSERT INTO package_confirmations (${CONFIRMATION_COLUMNS})
        SELECT $1, $2, COALESCE(MAX(sequence), 0) + 1, $3, $4, $5, $6
        FROM package_confirmations
        WHERE package_id = $2
        RETURNING ${CONFIRMATION_COLUMNS}
      `,
      [entry.entry_id, packageId, entry.section, entry.acknowledged, entry.comment, entry.recorded_at],
    );

    const row = inserted.rows[0];
    if (!row) {
      throw new Error(`Confirmation insert for package ${packageId} returned no row`);
    }
    return confirmationFromRow(row);
  });
}
