/**
 * Tests for backup routes.
 *
 * Verifies:
 * - Overwrites are listed as backup summaries, newest first
 * - Restore puts the backed-up facts back and takes a safety backup
 * - Unknown backup ids map to 404
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest, seed, uploadFacts } from "../setup.js";

interface BackupList {
  data: {
    id: string;
    entityCode: string;
    dataType: string;
    periods: string[];
    recordCount: number;
    user: string;
    description: string;
    createdAt: string;
    digest: string;
  }[];
}

describe("GET /api/v1/backups", () => {
  it("is empty before any overwrite", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/backups");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ data: [] });
  });

  it("summarizes the facts an overwrite replaced", async () => {
    const { app } = createTestApp();
    await seed(app);
    await uploadFacts(app, "F2001", "actual", ["Account Code", "Jan-24"], [
      ["4000", 100],
      ["5000", 40],
    ]);
    await uploadFacts(app, "F2001", "actual", ["Account Code", "Jan-24"], [["4000", 120]]);

    const res = await app.request("/api/v1/backups");
    const body = (await res.json()) as BackupList;

    expect(body.data).toHaveLength(1);
    const [backup] = body.data;
    expect(backup).toMatchObject({
      entityCode: "F2001",
      dataType: "actual",
      periods: ["2024-01-01"],
      recordCount: 1,
      user: "api",
      description: "Backup before upload on 2024-05-01 09:30",
      createdAt: "2024-05-01T09:30:00.000Z",
    });
    expect(backup?.digest).toMatch(/^[a-f0-9]{64}$/);
    expect(backup).not.toHaveProperty("records");
  });
});

describe("POST /api/v1/backups/:id/restore", () => {
  it("restores the replaced facts", async () => {
    const { app, store } = createTestApp();
    await seed(app);
    await uploadFacts(app, "F2001", "actual", ["Account Code", "Jan-24"], [["4000", 100]]);
    const overwrite = await uploadFacts(app, "F2001", "actual", ["Account Code", "Jan-24"], [
      ["4000", 120],
    ]);
    const { data } = (await overwrite.json()) as { data: { backupId: string } };

    const res = await app.request(
      jsonRequest(`/api/v1/backups/${data.backupId}/restore`, "POST", { user: "controller" }),
    );

    expect(res.status).toBe(200);
    const body = (await res.json()) as {
      data: { backupId: string; restored: number; safetyBackupId?: string };
    };
    expect(body.data.backupId).toBe(data.backupId);
    expect(body.data.restored).toBe(1);
    expect(typeof body.data.safetyBackupId).toBe("string");
    expect(store.facts.query({ entityCodes: ["F2001"] }).map((f) => f.amount)).toEqual([
      "100.00",
    ]);

    const list = (await (await app.request("/api/v1/backups")).json()) as BackupList;
    expect(list.data.map((b) => b.id)).toEqual([body.data.safetyBackupId, data.backupId]);
    expect(list.data[0]?.user).toBe("controller");
  });

  it("returns 404 for an unknown backup", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/api/v1/backups/missing/restore", "POST", {}));

    expect(res.status).toBe(404);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("UNKNOWN_BACKUP");
  });
});
