import { NotFoundError, PersistenceError } from "../../errors";
import {
  assertArchivablePackage,
  type ConfirmationDraft,
  type ConfirmationEntry,
  confirmationEntrySchema,
  type PackageSummary,
  readPackageDocument,
  type ReportPackage,
  summarizePackage,
} from "../../schemas/report_package";
import { KeyedMutex } from "../locks";
import type { ArchiveStore } from "./types";

interface ArenaSlot {
  document: string;
  confirmations: ConfirmationEntry[];
}

/**
 * In-process archive. Packages live in an append-only arena indexed by id; stored
 * documents are serialized copies, so nothing a caller holds can reach them.
 */
export class MemoryArchiveStore implements ArchiveStore {
  private readonly arena: ArenaSlot[] = [];
  private readonly index = new Map<string, number>();
  private readonly appendLocks = new KeyedMutex();
  private opened = false;

  async open(): Promise<void> {
    this.opened = true;
  }

  async close(): Promise<void> {
    this.opened = false;
  }

  async persist(pkg: ReportPackage): Promise<string> {
    this.assertOpen();
    assertArchivablePackage(pkg);
    if (this.index.has(pkg.package_id)) {
      throw new PersistenceError(`Package ${pkg.package_id} is already archived`);
    }

    this.arena.push({
      document: JSON.stringify({ ...pkg, confirmations: [] }),
      confirmations: pkg.confirmations.map((entry) => ({ ...entry })),
    });
    this.index.set(pkg.package_id, this.arena.length - 1);
    return pkg.package_id;
  }

  async get(packageId: string): Promise<ReportPackage> {
    this.assertOpen();
    const slot = this.slot(packageId);
    const pkg = readPackageDocument(JSON.parse(slot.document));
    return { ...pkg, confirmations: slot.confirmations.map((entry) => ({ ...entry })) };
  }

  async list(): Promise<PackageSummary[]> {
    this.assertOpen();
    return this.arena.map((slot) => summarizePackage(readPackageDocument(JSON.parse(slot.document))));
  }

  async appendConfirmation(packageId: string, entry: ConfirmationDraft): Promise<ConfirmationEntry> {
    this.assertOpen();

    return this.appendLocks.runExclusive(packageId, async () => {
      const slot = this.slot(packageId);
      const recorded = confirmationEntrySchema.parse({
        ...entry,
        package_id: packageId,
        sequence: slot.confirmations.length + 1,
      });
      slot.confirmations.push(Object.freeze(recorded));
      return { ...recorded };
    });
  }

  private slot(packageId: string): ArenaSlot {
    const position = this.index.get(packageId);
    const slot = position === undefined ? undefined : this.arena[position];
    if (!slot) {
      throw new NotFoundError(`Package ${packageId} not found`);
    }
    return slot;
  }

  private assertOpen(): void {
    if (!this.opened) {
      throw new PersistenceError("Archive store is not open");
    }
  }
}
