import { type ArchiveBackend, resolveArchiveBackend } from "../config/workflow_config";
import { MemoryArchiveStore } from "./archive/memory";
import { PostgresArchiveStore } from "./archive/postgres";
import type { ArchiveStore } from "./archive/types";

export type { ArchiveStore } from "./archive/types";
export { MemoryArchiveStore } from "./archive/memory";
export { PostgresArchiveStore } from "./archive/postgres";

let archive: Promise<ArchiveStore> | null = null;

export function createArchiveStore(backend: ArchiveBackend): ArchiveStore {
  return backend === "postgres" ? new PostgresArchiveStore() : new MemoryArchiveStore();
}

/** Process-wide archive, opened on first use. */
export async function openArchiveStore(): Promise<ArchiveStore> {
  if (!archive) {
    archive = (async () => {
      const store = createArchiveStore(resolveArchiveBackend());
      await store.open();
      return store;
    })();
  }

  try {
    return await archive;
  } catch (error) {
    archive = null;
    throw error;
  }
}

export async function closeArchiveStore(): Promise<void> {
  const current = archive;
  archive = null;

  if (current) {
    const store = await current;
    await store.close();
  }
}
