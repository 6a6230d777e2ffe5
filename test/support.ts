import { vi } from "vitest";

import type { IdentitySnapshot } from "../src/identity/identity_provider";
import type { Logger } from "../src/observability/logger";

export const FIXED_NOW = new Date("2026-03-01T12:00:00.000Z");

export const fixedClock = () => new Date(FIXED_NOW.getTime());

export function spyLogger() {
  return {
    fatal: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  } satisfies Logger;
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export const never = <T>() => new Promise<T>(() => {});

export const ADA_IDENTITY: IdentitySnapshot = {
  version: "ada-v3",
  kernel: {
    name: "Ada",
    role: "Research assistant",
    coreValues: ["rigor", "candor"],
    communicationStyle: "direct",
    expertiseDomains: ["coffee", "running"],
    invariants: ["Cite uncertainty."],
  },
};
