import { describe, expect, it, vi } from "vitest";

import { IdSpaceExhaustedError, ShareIdTakenError } from "../errors";
import { silentLogger } from "../test-helpers";
import { SHARE_ID_PATTERN, ShareIdService } from "./share-id";

const options = { length: 10, maxAttempts: 5, urlBase: "http://localhost:3000" };

describe("ShareIdService", () => {
  it("mints URL-safe ids of the configured length", async () => {
    const service = new ShareIdService({ exists: async () => false }, options, silentLogger);

    const shareId = await service.mint();

    expect(shareId).toMatch(/^[A-Za-z0-9_-]{10}$/);
    expect(SHARE_ID_PATTERN.test(shareId)).toBe(true);
  });

  it("never hands out an id twice across 10,000 mints with forced collisions", async () => {
    const taken = new Set<string>();
    let calls = 0;
    let collisions = 0;
    let last = "";
    // Every third candidate repeats the previously minted id.
    const generate = (length: number) => {
      calls += 1;
      if (calls % 3 === 0 && last) return last;
      return calls.toString(36).padStart(length, "0");
    };
    const service = new ShareIdService(
      {
        exists: async (shareId) => {
          const hit = taken.has(shareId);
          if (hit) collisions += 1;
          return hit;
        },
      },
      { ...options, generate },
      silentLogger,
    );

    for (let index = 0; index < 10_000; index += 1) {
      const shareId = await service.mint();
      expect(taken.has(shareId)).toBe(false);
      taken.add(shareId);
      last = shareId;
    }

    expect(taken.size).toBe(10_000);
    expect(collisions).toBe(4_999);
  });

  it("gives up after the configured number of attempts", async () => {
    const generate = vi.fn((length: number) => "x".repeat(length));
    const service = new ShareIdService(
      { exists: async () => true },
      { ...options, maxAttempts: 3, generate },
      silentLogger,
    );

    await expect(service.mint()).rejects.toBeInstanceOf(IdSpaceExhaustedError);
    expect(generate).toHaveBeenCalledTimes(3);
  });

  it("mints again when the claim loses the id to another writer", async () => {
    const candidates = ["claimedId01", "freshId0001"];
    const service = new ShareIdService(
      { exists: async () => false },
      { ...options, generate: () => candidates.shift() ?? "unexpected" },
      silentLogger,
    );
    const claimed: string[] = [];

    const shareId = await service.mintWith(async (candidate) => {
      if (candidate === "claimedId01") throw new ShareIdTakenError(candidate);
      claimed.push(candidate);
    });

    expect(shareId).toBe("freshId0001");
    expect(claimed).toEqual(["freshId0001"]);
  });

  it("passes other claim failures through", async () => {
    const service = new ShareIdService({ exists: async () => false }, options, silentLogger);

    await expect(
      service.mintWith(async () => {
        throw new Error("EIO");
      }),
    ).rejects.toThrow("EIO");
  });

  it("builds share links from the configured base", () => {
    const service = new ShareIdService(
      { exists: async () => false },
      { ...options, urlBase: "https://cupping.example/journal" },
      silentLogger,
    );

    expect(service.shareUrl("abc123XYZ_")).toBe("https://cupping.example/journal?share=abc123XYZ_");
  });
});
