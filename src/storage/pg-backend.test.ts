import { PGlite } from "@electric-sql/pglite";
import { drizzle } from "drizzle-orm/pglite";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ensureSchema } from "../db/client";
import * as schema from "../db/schema";
import { ShareIdTakenError, ValidationError } from "../errors";
import { makeSession } from "../test-helpers";
import { PostgresStorageBackend } from "./pg-backend";

// PGlite runs Postgres in-process, so these exercise the real queries.
describe("PostgresStorageBackend", () => {
  let client: PGlite;
  let backend: PostgresStorageBackend;

  beforeEach(async () => {
    client = new PGlite();
    const db = drizzle(client, { schema });
    await ensureSchema(db);
    backend = new PostgresStorageBackend(db, () => client.close());
  });

  afterEach(async () => {
    await backend.close();
  });

  it("round-trips every column", async () => {
    const session = makeSession({
      attributes: { aroma: 8.25, acidity: 7.5 },
      cost: 12.5,
      finalizedAt: new Date("2025-02-01T10:00:00.123Z"),
    });
    await backend.put(session);

    expect(await backend.get(session.sessionId)).toEqual(session);
    expect(await backend.getByShareId(session.shareId)).toEqual(session);
    expect(await backend.exists(session.shareId)).toBe(true);
    expect(await backend.exists("missing-share")).toBe(false);
  });

  it("keeps share ids unique across sessions", async () => {
    const first = makeSession();
    await backend.put(first);

    await expect(backend.put(makeSession({ shareId: first.shareId }))).rejects.toBeInstanceOf(ShareIdTakenError);
    expect(await backend.getByShareId(first.shareId)).toEqual(first);
  });

  it("rewrites a record through update", async () => {
    const session = makeSession();
    await backend.put(session);
    const excludedAt = new Date("2025-06-01T00:00:00.000Z");

    const updated = await backend.update(session.sessionId, (current) => ({ ...current, excludedAt }));

    expect(updated?.excludedAt).toEqual(excludedAt);
    expect((await backend.get(session.sessionId))?.excludedAt).toEqual(excludedAt);
    expect(await backend.update("missing-session", (current) => current)).toBeNull();
  });

  it("leaves the row untouched when the mutator refuses", async () => {
    const session = makeSession();
    await backend.put(session);

    await expect(
      backend.update(session.sessionId, () => {
        throw new ValidationError([{ field: "finalizedAt", message: "session is finalized and can no longer be amended" }]);
      }),
    ).rejects.toBeInstanceOf(ValidationError);
    expect(await backend.get(session.sessionId)).toEqual(session);
  });

  it("lists sessions oldest first", async () => {
    const later = makeSession({ createdAt: new Date("2025-05-02T00:00:00.000Z") });
    const earlier = makeSession({ createdAt: new Date("2025-05-01T00:00:00.000Z") });
    await backend.put(later);
    await backend.put(earlier);

    expect((await backend.listAll()).map((session) => session.sessionId)).toEqual([
      earlier.sessionId,
      later.sessionId,
    ]);
  });

  it("returns events for one share id in time order", async () => {
    await backend.appendEvent({
      eventType: "copy_link",
      shareId: "share-a",
      timestamp: new Date("2025-01-01T00:05:00.000Z"),
      payload: {},
    });
    await backend.appendEvent({
      eventType: "view",
      shareId: "share-a",
      timestamp: new Date("2025-01-01T00:01:00.000Z"),
      payload: { referrer: "qr" },
    });
    await backend.appendEvent({
      eventType: "view",
      shareId: "share-b",
      timestamp: new Date("2025-01-01T00:00:00.000Z"),
      payload: {},
    });

    expect(await backend.listEvents("share-a")).toEqual([
      { eventType: "view", shareId: "share-a", timestamp: new Date("2025-01-01T00:01:00.000Z"), payload: { referrer: "qr" } },
      { eventType: "copy_link", shareId: "share-a", timestamp: new Date("2025-01-01T00:05:00.000Z"), payload: {} },
    ]);
  });

  it("creates the schema idempotently", async () => {
    const db = drizzle(client, { schema });
    await expect(ensureSchema(db)).resolves.toBeUndefined();
  });
});
