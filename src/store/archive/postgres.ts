import { EsgWorkflowError, errorMessage, NotFoundError, PersistenceError } from "../../errors";
import {
  assertArchivablePackage,
  type ConfirmationDraft,
  type ConfirmationEntry,
  type PackageSummary,
  type ReportPackage,
} from "../../schemas/report_package";
import { closePool, ensureSchema } from "../postgres/client";
import {
  appendPackageConfirmation,
  getPackage,
  insertPackage,
  listPackageSummaries,
} from "../postgres/packages";
import type { ArchiveStore } from "./types";

async function guarded<T>(operation: string, task: () => Promise<T>): Promise<T> {
  try {
    return await task();
  } catch (error) {
    if (error instanceof EsgWorkflowError) {
      throw error;
    }
    throw new PersistenceError(`Archive ${operation} failed: ${errorMessage(error)}`, { cause: error });
  }
}

export class PostgresArchiveStore implements ArchiveStore {
  async open(): Promise<void> {
    await guarded("open", () => ensureSchema());
  }

  async close(): Promise<void> {
    await guarded("close", () => closePool());
  }

  async persist(pkg: ReportPackage): Promise<string> {
    assertArchivablePackage(pkg);
    const inserted = await guarded("persist", () => insertPackage(pkg));
    if (!inserted) {
      throw new PersistenceError(`Package ${pkg.package_id} is already archived`);
    }
    return pkg.package_id;
  }

  async get(packageId: string): Promise<ReportPackage> {
    const pkg = await guarded("get", () => getPackage(packageId));
    if (!pkg) {
      throw new NotFoundError(`Package ${packageId} not found`);
    }
    return pkg;
  }

  async list(): Promise<PackageSummary[]> {
    return guarded("list", () => listPackageSummaries());
  }

  async appendConfirmation(packageId: string, entry: ConfirmationDraft): Promise<ConfirmationEntry> {
    return guarded("append", () => appendPackageConfirmation(packageId, entry));
  }
}
