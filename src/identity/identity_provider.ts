import { z } from "zod";

import { deepFreeze } from "../contracts/immutable";

export const IdentityKernelSchema = z
  .object({
    name: z.string().min(1).max(200),
    role: z.string().min(1).max(500),
    coreValues: z.array(z.string().min(1)).max(32).readonly(),
    communicationStyle: z.string().max(500),
    expertiseDomains: z.array(z.string().min(1)).max(32).readonly(),
    invariants: z.array(z.string().min(1)).max(32).readonly(),
  })
  .strict()
  .readonly();

export const IdentitySnapshotSchema = z
  .object({
    version: z.string().min(1).max(64),
    kernel: IdentityKernelSchema,
  })
  .strict()
  .readonly();

export type IdentityKernel = z.infer<typeof IdentityKernelSchema>;
export type IdentitySnapshot = z.infer<typeof IdentitySnapshotSchema>;

/**
 * Minimal safe persona used whenever identity resolution is unavailable.
 * Built once at module load and frozen; shared by reference across turns.
 */
export const MINIMAL_SKELETON_IDENTITY: IdentitySnapshot = deepFreeze({
  version: "skeleton-v0",
  kernel: {
    name: "Assistant",
    role: "General-purpose assistant",
    coreValues: ["honesty", "helpfulness", "safety"],
    communicationStyle: "clear and concise",
    expertiseDomains: [],
    invariants: ["Do not fabricate facts.", "Say plainly when you do not know something."],
  },
});

export interface IdentityProvider {
  resolve(userId: string, opts: { signal: AbortSignal }): Promise<IdentitySnapshot>;
}

export class IdentityNotFoundError extends Error {
  userId: string;

  constructor(userId: string) {
    super(`no identity snapshot for user ${userId}`);
    this.name = "IdentityNotFoundError";
    this.userId = userId;
  }
}

/**
 * Process-memory identity registry keyed by user id.
 * Snapshots are validated on the way in and frozen, so a resolved value is safe to share.
 */
export class MemoryIdentityProvider implements IdentityProvider {
  private readonly snapshots = new Map<string, IdentitySnapshot>();

  constructor(initial: Record<string, unknown> = {}) {
    for (const [userId, snapshot] of Object.entries(initial)) {
      this.put(userId, snapshot);
    }
  }

  put(userId: string, snapshot: unknown): IdentitySnapshot {
    const parsed = deepFreeze(IdentitySnapshotSchema.parse(snapshot));
    this.snapshots.set(userId, parsed);
    return parsed;
  }

  async resolve(userId: string, opts: { signal: AbortSignal }): Promise<IdentitySnapshot> {
    opts.signal.throwIfAborted();
    const snapshot = this.snapshots.get(userId);
    if (!snapshot) {
      throw new IdentityNotFoundError(userId);
    }
    return snapshot;
  }
}

function listOrNone(items: readonly string[], separator: string): string {
  return items.length ? items.join(separator) : "(none)";
}

export function renderIdentitySnapshot(identity: IdentitySnapshot): string {
  const { kernel } = identity;
  const lines: string[] = [];

  lines.push(`Name: ${kernel.name}`);
  lines.push(`Role: ${kernel.role}`);
  lines.push(`Core Values: ${listOrNone(kernel.coreValues, ", ")}`);
  lines.push(`Communication: ${kernel.communicationStyle || "(unspecified)"}`);
  lines.push(`Expertise: ${listOrNone(kernel.expertiseDomains, ", ")}`);
  lines.push(`Invariants: ${listOrNone(kernel.invariants, "; ")}`);

  return lines.join("\n");
}
