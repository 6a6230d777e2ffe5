import { describe, it, expect } from "vitest";

import {
  IdentityNotFoundError,
  MINIMAL_SKELETON_IDENTITY,
  MemoryIdentityProvider,
  renderIdentitySnapshot,
} from "../src/identity/identity_provider";
import { ADA_IDENTITY } from "./support";

const live = () => new AbortController().signal;

describe("renderIdentitySnapshot", () => {
  it("renders the skeleton persona", () => {
    expect(renderIdentitySnapshot(MINIMAL_SKELETON_IDENTITY)).toBe(
      [
        "Name: Assistant",
        "Role: General-purpose assistant",
        "Core Values: honesty, helpfulness, safety",
        "Communication: clear and concise",
        "Expertise: (none)",
        "Invariants: Do not fabricate facts.; Say plainly when you do not know something.",
      ].join("\n")
    );
  });

  it("marks an empty communication style as unspecified", () => {
    const text = renderIdentitySnapshot({
      ...ADA_IDENTITY,
      kernel: { ...ADA_IDENTITY.kernel, communicationStyle: "" },
    });

    expect(text.split("\n")[3]).toBe("Communication: (unspecified)");
  });
});

describe("MINIMAL_SKELETON_IDENTITY", () => {
  it("is deeply frozen", () => {
    expect(Object.isFrozen(MINIMAL_SKELETON_IDENTITY)).toBe(true);
    expect(Object.isFrozen(MINIMAL_SKELETON_IDENTITY.kernel)).toBe(true);
    expect(Object.isFrozen(MINIMAL_SKELETON_IDENTITY.kernel.coreValues)).toBe(true);
    expect(Reflect.set(MINIMAL_SKELETON_IDENTITY.kernel, "name", "Mallory")).toBe(false);
  });
});

describe("MemoryIdentityProvider", () => {
  it("resolves a stored snapshot as a frozen value", async () => {
    const provider = new MemoryIdentityProvider({ "user-1": ADA_IDENTITY });
    const resolved = await provider.resolve("user-1", { signal: live() });

    expect(resolved).toEqual(ADA_IDENTITY);
    expect(Object.isFrozen(resolved.kernel.expertiseDomains)).toBe(true);
  });

  it("rejects unknown users with IdentityNotFoundError", async () => {
    const provider = new MemoryIdentityProvider();

    await expect(provider.resolve("ghost", { signal: live() })).rejects.toBeInstanceOf(IdentityNotFoundError);
  });

  it("rejects once the signal is aborted", async () => {
    const provider = new MemoryIdentityProvider({ "user-1": ADA_IDENTITY });
    const controller = new AbortController();
    controller.abort();

    await expect(provider.resolve("user-1", { signal: controller.signal })).rejects.toThrow();
  });

  it("refuses a snapshot that fails validation", () => {
    const provider = new MemoryIdentityProvider();

    expect(() => provider.put("user-1", { version: "v1", kernel: { name: "" } })).toThrow();
    expect(() => provider.put("user-1", { ...ADA_IDENTITY, extra: true })).toThrow();
  });

  it("replaces a snapshot on put", async () => {
    const provider = new MemoryIdentityProvider({ "user-1": ADA_IDENTITY });
    provider.put("user-1", { ...ADA_IDENTITY, version: "ada-v4" });

    const resolved = await provider.resolve("user-1", { signal: live() });
    expect(resolved.version).toBe("ada-v4");
  });
});
