import { randomUUID } from "node:crypto";

import { z } from "zod";

import { ValidationError } from "../errors";
import { formatZodIssues } from "../schemas/enterprise_input";
import type { ConfirmationEntry } from "../schemas/report_package";
import type { ArchiveStore } from "../store/archive";
import { hasPackageSection } from "../workflow/sections";

export const confirmationInputSchema = z
  .object({
    section: z.string().trim().min(1).max(200),
    acknowledged: z.boolean(),
    comment: z.string().trim().max(2000).nullish(),
  })
  .strict();

export type ConfirmationInput = z.input<typeof confirmationInputSchema>;

export interface ConfirmationLedgerOptions {
  now?: () => Date;
  createEntryId?: () => string;
}

/** Validation in front of the archive: a confirmation may only reference content the package has. */
export class ConfirmationLedger {
  private readonly now: () => Date;
  private readonly createEntryId: () => string;

  constructor(
    private readonly store: ArchiveStore,
    options: ConfirmationLedgerOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.createEntryId = options.createEntryId ?? (() => `conf-${randomUUID()}`);
  }

  async append(packageId: string, input: unknown): Promise<ConfirmationEntry> {
    const parsed = confirmationInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError("Confirmation input is invalid", formatZodIssues(parsed.error));
    }

    const pkg = await this.store.get(packageId);
    if (!hasPackageSection(pkg, parsed.data.section)) {
      throw new ValidationError(`Package ${packageId} has no section "${parsed.data.section}"`, [
        `section: must reference an artifact or sub-section present in the package`,
      ]);
    }

    const comment = parsed.data.comment ?? null;
    return this.store.appendConfirmation(packageId, {
      entry_id: this.createEntryId(),
      package_id: packageId,
      section: parsed.data.section,
      acknowledged: parsed.data.acknowledged,
      comment: comment && comment.length > 0 ? comment : null,
      recorded_at: this.now().toISOString(),
    });
  }

  async list(packageId: string): Promise<ConfirmationEntry[]> {
    const pkg = await this.store.get(packageId);
    return pkg.confirmations;
  }
}
