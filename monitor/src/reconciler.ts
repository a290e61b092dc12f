import { InfluxConnection, seriesRows } from "./db/connection";
import {
  alterRetentionPolicy,
  createRetentionPolicy,
  dropContinuousQuery,
  showContinuousQueries,
  showRetentionPolicies,
} from "./db/queries";
import { Database, RetentionPolicyWire, wireKey } from "./db/schema";
import { ErrorLog, MultipleDefaultPolicies } from "./errors";

export interface PolicyChanges {
  created: string[];
  altered: string[];
}

export interface QueryChanges {
  dropped: string[];
  created: string[];
}

function wireFromRow(row: Record<string, unknown>): RetentionPolicyWire {
  return {
    name: String(row.name),
    duration: String(row.duration),
    shardGroupDuration: String(row.shardGroupDuration),
    replicaN: Number(row.replicaN),
    default: row.default === true,
  };
}

/**
 * Brings the server's retention policies and continuous queries in line
 * with the declared schema. Server errors are recorded and skipped; only
 * an ambiguous default policy aborts.
 */
export class SchemaReconciler {
  private conn: InfluxConnection;
  private database: Database;
  private errors: ErrorLog;

  constructor(conn: InfluxConnection, database: Database, errors: ErrorLog) {
    this.conn = conn;
    this.database = database;
    this.errors = errors;
  }

  async reconcile(): Promise<{ policies: PolicyChanges; queries: QueryChanges }> {
    const policies = await this.reconcileRetentionPolicies();
    const queries = await this.reconcileContinuousQueries();
    return { policies, queries };
  }

  /** Creates missing policies and alters drifted ones on `databaseName` */
  async reconcileRetentionPolicies(databaseName: string = this.database.name): Promise<PolicyChanges> {
    const declared = this.database.retentionPolicies;
    const defaults = declared.filter((policy) => policy.isDefault);
    if (defaults.length > 1) {
      throw new MultipleDefaultPolicies(
        `only one retention policy may be the default, got ${defaults.map((policy) => policy.name).join(", ")}`,
      );
    }

    const changes: PolicyChanges = { created: [], altered: [] };
    const live = new Map<string, string>();
    try {
      const [result] = await this.conn.query(showRetentionPolicies(databaseName), { database: databaseName });
      for (const series of result?.series ?? []) {
        for (const row of seriesRows(series)) {
          const wire = wireFromRow(row);
          live.set(wire.name, wireKey(wire));
        }
      }
    } catch (err) {
      this.errors.recordError(err, `failed to list retention policies of ${databaseName}`);
      return changes;
    }

    for (const policy of declared) {
      const current = live.get(policy.name);
      if (current === policy.key()) continue;

      const statement =
        current === undefined ? createRetentionPolicy(policy, databaseName) : alterRetentionPolicy(policy, databaseName);
      try {
        await this.conn.command(statement, { database: databaseName });
      } catch (err) {
        this.errors.recordError(err, `failed to apply retention policy ${policy.name}`);
        continue;
      }
      if (current === undefined) {
        changes.created.push(policy.name);
        console.log(`[reconcile] created retention policy ${databaseName}.${policy.name}`);
      } else {
        changes.altered.push(policy.name);
        console.log(`[reconcile] altered retention policy ${databaseName}.${policy.name}`);
      }
    }
    return changes;
  }

  /**
   * Continuous queries cannot be altered, so a changed query is dropped and
   * created again. All drops run before any create.
   */
  async reconcileContinuousQueries(): Promise<QueryChanges> {
    const changes: QueryChanges = { dropped: [], created: [] };
    const live = new Map<string, string>();
    try {
      const [result] = await this.conn.query(showContinuousQueries());
      for (const series of result?.series ?? []) {
        if (series.name !== this.database.name) continue;
        for (const row of seriesRows(series)) {
          live.set(String(row.name), String(row.query));
        }
      }
    } catch (err) {
      this.errors.recordError(err, "failed to list continuous queries");
      return changes;
    }

    const stale: string[] = [];
    const toCreate = this.database.continuousQueries.filter((query) => {
      const current = live.get(query.name);
      if (current === undefined) return true;
      if (current === query.render()) return false;
      stale.push(query.name);
      return true;
    });

    const failedDrops = new Set<string>();
    for (const name of stale) {
      try {
        await this.conn.command(dropContinuousQuery(name, this.database.name));
        changes.dropped.push(name);
      } catch (err) {
        failedDrops.add(name);
        this.errors.recordError(err, `failed to drop continuous query ${name}`);
      }
    }

    for (const query of toCreate) {
      if (failedDrops.has(query.name)) continue;
      try {
        await this.conn.command(query.render());
        changes.created.push(query.name);
      } catch (err) {
        this.errors.recordError(err, `failed to create continuous query ${query.name}`);
      }
    }

    if (changes.dropped.length > 0 || changes.created.length > 0) {
      console.log(
        `[reconcile] continuous queries: ${changes.dropped.length} dropped, ${changes.created.length} created`,
      );
    }
    return changes;
  }
}
