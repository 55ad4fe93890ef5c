import type { ConfirmationDraft, ConfirmationEntry, PackageSummary, ReportPackage } from "../../schemas/report_package";

/**
 * Durable home of sealed packages. Artifacts are written once by `persist`; the only
 * later write is `appendConfirmation`, which is serialized per package.
 */
export interface ArchiveStore {
  open(): Promise<void>;
  close(): Promise<void>;
  persist(pkg: ReportPackage): Promise<string>;
  get(packageId: string): Promise<ReportPackage>;
  /** Callers must not assume any ordering. */
  list(): Promise<PackageSummary[]>;
  appendConfirmation(packageId: string, entry: ConfirmationDraft): Promise<ConfirmationEntry>;
}
