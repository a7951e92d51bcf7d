import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  DEFAULT_MODIFIED_SINCE,
  KyselyWatermarkStore,
  MemoryWatermarkStore,
  advanceWatermark,
  initializeWatermark,
} from "../../../../src/services/sync/watermark.js";
import { createTestDb } from "../../../helpers/sqlite.js";

import type { Database } from "../../../../src/db/types.js";
import type { Kysely } from "kysely";

const T = new Date("2024-03-10T23:45:00Z");

describe("watermark", () => {
  describe("initializeWatermark", () => {
    it("should fetch everything on the first cycle", () => {
      expect(initializeWatermark(T)).toEqual({
        nextRunAt: T,
        modifiedSince: "2000-01-01",
      });
      expect(DEFAULT_MODIFIED_SINCE).toBe("2000-01-01");
    });

    it("should accept a modified-since override", () => {
      expect(initializeWatermark(T, "2024-01-15").modifiedSince).toBe("2024-01-15");
    });

    it("should reject a malformed override", () => {
      expect(() => initializeWatermark(T, "15/01/2024")).toThrow(RangeError);
    });
  });

  describe("advanceWatermark", () => {
    it("should move the window to the date of the cycle that ran", () => {
      expect(advanceWatermark(initializeWatermark(T))).toEqual({
        modifiedSince: "2024-03-10",
        nextRunAt: new Date("2024-03-11T00:15:00Z"),
      });
    });

    it("should step 30 minutes at a time and never move the window back", () => {
      let state = initializeWatermark(T);
      const seen: string[] = [];
      for (let i = 0; i < 4; i++) {
        const next = advanceWatermark(state);
        expect(next.nextRunAt.getTime() - state.nextRunAt.getTime()).toBe(
          30 * 60_000
        );
        expect(next.modifiedSince >= state.modifiedSince).toBe(true);
        seen.push(next.modifiedSince);
        state = next;
      }
      expect(seen).toEqual(["2024-03-10", "2024-03-11", "2024-03-11", "2024-03-11"]);
    });

    it("should use a custom interval", () => {
      expect(advanceWatermark(initializeWatermark(T), 60).nextRunAt).toEqual(
        new Date("2024-03-11T00:45:00Z")
      );
    });
  });

  describe("MemoryWatermarkStore", () => {
    it("should return what was saved", async () => {
      const store = new MemoryWatermarkStore();
      expect(await store.load()).toBeNull();

      await store.save(initializeWatermark(T));
      expect(await store.load()).toEqual(initializeWatermark(T));
    });
  });

  describe("KyselyWatermarkStore", () => {
    let db: Kysely<Database>;

    beforeEach(async () => {
      db = await createTestDb();
    });

    afterEach(async () => {
      await db.destroy();
    });

    it("should persist and overwrite the state", async () => {
      const store = new KyselyWatermarkStore(db);
      expect(await store.load()).toBeNull();

      await store.save(initializeWatermark(T));
      await store.save(advanceWatermark(initializeWatermark(T)));

      expect(await store.load()).toEqual({
        nextRunAt: new Date("2024-03-11T00:15:00Z"),
        modifiedSince: "2024-03-10",
      });
      const rows = await db.selectFrom("sync_watermarks").select("stream").execute();
      expect(rows).toEqual([{ stream: "licenses" }]);
    });

    it("should keep streams apart", async () => {
      await new KyselyWatermarkStore(db, "other").save(initializeWatermark(T));

      expect(await new KyselyWatermarkStore(db).load()).toBeNull();
    });
  });
});
