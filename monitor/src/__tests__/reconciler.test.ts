import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { SchemaReconciler } from "../reconciler";
import { ContinuousQuery } from "../db/queries";
import { Database, RetentionPolicy } from "../db/schema";
import { ErrorLog, InfluxHttpError, MultipleDefaultPolicies } from "../errors";
import { FakeInflux, series } from "./helpers";

const POLICY_COLUMNS = ["name", "duration", "shardGroupDuration", "replicaN", "default"];

function setup() {
  const db = new Database("spp");
  db.addRetentionPolicy(new RetentionPolicy({ name: "rp_days_14", database: db, duration: "14d", isDefault: true }));
  db.addRetentionPolicy(new RetentionPolicy({ name: "rp_year", database: db, duration: "56w" }));
  const conn = new FakeInflux();
  const errors = new ErrorLog();
  return { db, conn, errors, reconciler: new SchemaReconciler(conn, db, errors) };
}

function rawQuery(db: Database, name: string, select: string): ContinuousQuery {
  return new ContinuousQuery({ name, database: db, query: select });
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("reconcileRetentionPolicies", () => {
  it("creates missing policies and leaves matching ones alone", async () => {
    const { conn, reconciler } = setup();
    conn.respond(/^SHOW RETENTION POLICIES/, () =>
      series("", POLICY_COLUMNS, [
        ["autogen", "0s", "168h0m0s", 1, false],
        ["rp_days_14", "336h0m0s", "0h0m0s", 1, true],
      ]),
    );

    const changes = await reconciler.reconcileRetentionPolicies();
    expect(changes).toEqual({ created: ["rp_year"], altered: [] });
    expect(conn.statements).toEqual([
      'SHOW RETENTION POLICIES ON "spp"',
      'CREATE RETENTION POLICY "rp_year" ON "spp" DURATION 9408h0m0s REPLICATION 1 SHARD DURATION 0h0m0s',
    ]);
  });

  it("alters policies that drifted", async () => {
    const { conn, reconciler } = setup();
    conn.respond(/^SHOW RETENTION POLICIES/, () =>
      series("", POLICY_COLUMNS, [
        ["rp_days_14", "336h0m0s", "0h0m0s", 1, true],
        ["rp_year", "8760h0m0s", "0h0m0s", 1, false],
      ]),
    );

    const changes = await reconciler.reconcileRetentionPolicies();
    expect(changes).toEqual({ created: [], altered: ["rp_year"] });
    expect(conn.statements[1]).toBe(
      'ALTER RETENTION POLICY "rp_year" ON "spp" DURATION 9408h0m0s REPLICATION 1 SHARD DURATION 0h0m0s',
    );
  });

  it("targets another database when asked", async () => {
    const { conn, reconciler } = setup();
    await reconciler.reconcileRetentionPolicies("spp_copy");
    expect(conn.statements).toEqual([
      'SHOW RETENTION POLICIES ON "spp_copy"',
      'CREATE RETENTION POLICY "rp_days_14" ON "spp_copy" DURATION 336h0m0s REPLICATION 1 SHARD DURATION 0h0m0s DEFAULT',
      'CREATE RETENTION POLICY "rp_year" ON "spp_copy" DURATION 9408h0m0s REPLICATION 1 SHARD DURATION 0h0m0s',
    ]);
    expect(conn.statementOptions.every((opts) => opts.database === "spp_copy")).toBe(true);
  });

  it("fails before any request when two policies are default", async () => {
    const { db, conn, reconciler } = setup();
    db.addRetentionPolicy(new RetentionPolicy({ name: "rp_days_7", database: db, duration: "7d", isDefault: true }));

    await expect(reconciler.reconcileRetentionPolicies()).rejects.toThrow(MultipleDefaultPolicies);
    expect(conn.statements).toEqual([]);
  });

  it("records a failed listing and changes nothing", async () => {
    const { conn, errors, reconciler } = setup();
    conn.respond(/^SHOW RETENTION POLICIES/, () => {
      throw new InfluxHttpError("database not found: spp", 200, "");
    });

    expect(await reconciler.reconcileRetentionPolicies()).toEqual({ created: [], altered: [] });
    expect(conn.statements).toHaveLength(1);
    expect(errors.messages).toEqual([
      "InfluxHttpError: database not found: spp",
      "failed to list retention policies of spp",
    ]);
  });

  it("keeps going after a failed create", async () => {
    const { conn, errors, reconciler } = setup();
    conn.respond(/^CREATE RETENTION POLICY "rp_days_14"/, () => {
      throw new InfluxHttpError("authorization failed", 403, "");
    });

    const changes = await reconciler.reconcileRetentionPolicies();
    expect(changes).toEqual({ created: ["rp_year"], altered: [] });
    expect(errors.count).toBe(2);
  });
});

describe("reconcileContinuousQueries", () => {
  it("drops stale queries before creating anything", async () => {
    const { db, conn, reconciler } = setup();
    const same = rawQuery(db, "cq_same", "SELECT mean(a) INTO x FROM y GROUP BY time(1h)");
    const changed = rawQuery(db, "cq_changed", "SELECT mean(b) INTO x FROM y GROUP BY time(1h)");
    const added = rawQuery(db, "cq_added", "SELECT mean(c) INTO x FROM y GROUP BY time(1h)");
    db.addContinuousQuery(same);
    db.addContinuousQuery(changed);
    db.addContinuousQuery(added);

    conn.respond(/^SHOW CONTINUOUS QUERIES/, () => [
      {
        series: [
          {
            name: "spp",
            columns: ["name", "query"],
            values: [
              ["cq_same", same.render()],
              ["cq_changed", "CREATE CONTINUOUS QUERY cq_changed ON spp BEGIN SELECT old END"],
            ],
          },
          { name: "other", columns: ["name", "query"], values: [["cq_added", "CREATE ..."]] },
        ],
      },
    ]);

    const changes = await reconciler.reconcileContinuousQueries();
    expect(changes).toEqual({ dropped: ["cq_changed"], created: ["cq_changed", "cq_added"] });
    expect(conn.statements).toEqual([
      "SHOW CONTINUOUS QUERIES",
      'DROP CONTINUOUS QUERY "cq_changed" ON "spp"',
      changed.render(),
      added.render(),
    ]);
  });

  it("does not recreate a query it failed to drop", async () => {
    const { db, conn, errors, reconciler } = setup();
    const changed = rawQuery(db, "cq_changed", "SELECT mean(b) INTO x FROM y GROUP BY time(1h)");
    db.addContinuousQuery(changed);
    conn.respond(/^SHOW CONTINUOUS QUERIES/, () => [
      { series: [{ name: "spp", columns: ["name", "query"], values: [["cq_changed", "old"]] }] },
    ]);
    conn.respond(/^DROP CONTINUOUS QUERY/, () => {
      throw new InfluxHttpError("timeout", 0, "");
    });

    expect(await reconciler.reconcileContinuousQueries()).toEqual({ dropped: [], created: [] });
    expect(errors.count).toBe(2);
  });

  it("runs both passes from reconcile", async () => {
    const { db, conn, reconciler } = setup();
    db.addContinuousQuery(rawQuery(db, "cq_added", "SELECT mean(c) INTO x FROM y GROUP BY time(1h)"));

    const changes = await reconciler.reconcile();
    expect(changes).toEqual({
      policies: { created: ["rp_days_14", "rp_year"], altered: [] },
      queries: { dropped: [], created: ["cq_added"] },
    });
    expect(conn.statements).toHaveLength(5);
  });
});
