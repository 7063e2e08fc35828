import { nanoid } from "nanoid";

import { IdSpaceExhaustedError, ShareIdTakenError } from "../errors";
import type { Logger } from "../logger";
import type { StorageBackend } from "../storage";

export type ShareIdOptions = {
  length: number;
  maxAttempts: number;
  urlBase: string;
  // Swappable for tests that need to force collisions.
  generate?: (length: number) => string;
};

// Public identifiers: fixed length, URL-safe alphabet (A-Z a-z 0-9 _ -).
export const SHARE_ID_PATTERN = /^[A-Za-z0-9_-]{6,32}$/;

export class ShareIdService {
  private readonly generate: (length: number) => string;

  constructor(
    private readonly storage: Pick<StorageBackend, "exists">,
    private readonly options: ShareIdOptions,
    private readonly logger: Logger,
  ) {
    this.generate = options.generate ?? nanoid;
  }

  // Mints an id no stored session uses. Every candidate is checked against the
  // backend, so ids are never handed out twice.
  mint(): Promise<string> {
    return this.mintWith(async () => {});
  }

  // Mints an id and hands it to `claim`, which persists it. A claim rejected
  // with ShareIdTakenError (another writer won the id) counts as a collision.
  async mintWith(claim: (shareId: string) => Promise<void>): Promise<string> {
    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt += 1) {
      const candidate = this.generate(this.options.length);
      if (await this.storage.exists(candidate)) {
        this.logger.warn({ attempt }, "share id collision, minting another");
        continue;
      }
      try {
        await claim(candidate);
        return candidate;
      } catch (error) {
        if (!(error instanceof ShareIdTakenError)) throw error;
        this.logger.warn({ attempt }, "share id claimed concurrently, minting another");
      }
    }
    this.logger.error({ attempts: this.options.maxAttempts }, "share id space exhausted");
    throw new IdSpaceExhaustedError(this.options.maxAttempts);
  }

  shareUrl(shareId: string): string {
    const url = new URL(this.options.urlBase);
    url.searchParams.set("share", shareId);
    return url.toString();
  }
}
