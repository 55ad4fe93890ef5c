import { z } from "zod";

import { PersistenceError, ValidationError } from "../errors";
import { artifactSchema, stageNameSchema } from "./artifacts";
import { enterpriseInputSchema, formatZodIssues } from "./enterprise_input";

export const PACKAGE_SCHEMA_VERSION = 1;

export const packageStatusSchema = z.enum(["complete", "partial"]);

export type PackageStatus = z.infer<typeof packageStatusSchema>;

export const packageFailureSchema = z.object({
  stage: stageNameSchema,
  reason: z.string().min(1),
});

export type PackageFailure = z.infer<typeof packageFailureSchema>;

export const confirmationEntrySchema = z.object({
  entry_id: z.string().min(1),
  package_id: z.string().min(1),
  sequence: z.number().int().positive(),
  section: z.string().min(1),
  acknowledged: z.boolean(),
  comment: z.string().nullable(),
  recorded_at: z.string().min(1),
});

export type ConfirmationEntry = z.infer<typeof confirmationEntrySchema>;

/** A confirmation before the archive assigns its position in the package ledger. */
export type ConfirmationDraft = Omit<ConfirmationEntry, "sequence">;

export const reportPackageSchema = z.object({
  schema_version: z.literal(PACKAGE_SCHEMA_VERSION),
  package_id: z.string().min(1),
  status: packageStatusSchema,
  failure: packageFailureSchema.nullable(),
  created_at: z.string().min(1),
  stage_order: z.array(stageNameSchema),
  input: enterpriseInputSchema,
  artifacts: z.array(artifactSchema),
  confirmations: z.array(confirmationEntrySchema),
});

export type ReportPackage = z.infer<typeof reportPackageSchema>;

export interface PackageSummary {
  package_id: string;
  status: PackageStatus;
  created_at: string;
}

export function summarizePackage(pkg: ReportPackage): PackageSummary {
  return {
    package_id: pkg.package_id,
    status: pkg.status,
    created_at: pkg.created_at,
  };
}

/** Rejects a package the archive could not read back. */
export function assertArchivablePackage(pkg: ReportPackage): ReportPackage {
  const parsed = reportPackageSchema.safeParse(pkg);
  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error);
    throw new ValidationError(`Package ${pkg.package_id} cannot be archived: ${issues.slice(0, 5).join("; ")}`, issues);
  }
  return parsed.data;
}

type PackageDocumentReader = (document: object) => ReportPackage;

// Every shape ever written keeps a reader here; archived packages stay readable.
const PACKAGE_DOCUMENT_READERS: Record<number, PackageDocumentReader> = {
  1: (document) => {
    const parsed = reportPackageSchema.safeParse(document);
    if (!parsed.success) {
      throw new PersistenceError(
        `Archived package document is malformed: ${formatZodIssues(parsed.error).slice(0, 5).join("; ")}`,
      );
    }
    return parsed.data;
  },
};

export function readPackageDocument(value: unknown): ReportPackage {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new PersistenceError("Archived package document is not an object");
  }

  const version: unknown = Reflect.get(value, "schema_version");
  const reader = typeof version === "number" ? PACKAGE_DOCUMENT_READERS[version] : undefined;
  if (!reader) {
    throw new PersistenceError(`Unsupported package schema version: ${String(version)}`);
  }

  return reader(value);
}
