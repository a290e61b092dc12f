import { InvalidArgument } from "../errors";
import { ContinuousQueryTemplate } from "./queries";
import { Database, Datatype, RetentionPolicy, Table, isDatatype, isRecord } from "./schema";
import rawDefinitions from "./definitions.json";

// ─── Definition types ───────────────────────────────────────────────
// Shape of definitions.json: every measurement the monitor writes.

export interface PolicyDefinition {
  duration: string;
  default?: boolean;
}

export interface QueryTemplateDefinition {
  /** `downsample` groups by `*` or the listed args; `custom` adds a WHERE clause */
  template: "downsample" | "custom";
  fields: string[];
  retentionPolicy: string;
  groupTime: string;
  groupArgs?: string[];
  where?: string;
}

export interface TableDefinition {
  name: string;
  fields: Record<string, Datatype>;
  tags: string[];
  timeKey?: string;
  retentionPolicy?: string;
  continuousQueries?: QueryTemplateDefinition[];
}

export interface Definitions {
  retentionPolicies: Record<string, PolicyDefinition>;
  tables: TableDefinition[];
}

// ─── Validation ─────────────────────────────────────────────────────

function stringList(value: unknown, what: string): string[] {
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === "string")) {
    throw new InvalidArgument(`${what} must be a list of strings`);
  }
  return value;
}

function optionalString(value: unknown, what: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "string") throw new InvalidArgument(`${what} must be a string`);
  return value;
}

function requiredString(value: unknown, what: string): string {
  const text = optionalString(value, what);
  if (!text) throw new InvalidArgument(`${what} is required`);
  return text;
}

function parsePolicy(name: string, raw: unknown): PolicyDefinition {
  if (!isRecord(raw)) throw new InvalidArgument(`retention policy ${name} must be an object`);
  const isDefault = raw.default;
  if (isDefault !== undefined && typeof isDefault !== "boolean") {
    throw new InvalidArgument(`default flag of retention policy ${name} must be a boolean`);
  }
  return { duration: requiredString(raw.duration, `duration of retention policy ${name}`), default: isDefault };
}

function parseTemplate(table: string, index: number, raw: unknown): QueryTemplateDefinition {
  const what = `continuous query ${index} of table ${table}`;
  if (!isRecord(raw)) throw new InvalidArgument(`${what} must be an object`);
  const template = raw.template;
  if (template !== "downsample" && template !== "custom") {
    throw new InvalidArgument(`${what} has unknown template ${String(template)}`);
  }
  const where = optionalString(raw.where, `where clause of ${what}`);
  if (template === "custom" && !where) {
    throw new InvalidArgument(`${what} is a custom template without a where clause`);
  }
  return {
    template,
    fields: stringList(raw.fields, `fields of ${what}`),
    retentionPolicy: requiredString(raw.retentionPolicy, `retention policy of ${what}`),
    groupTime: requiredString(raw.groupTime, `group time of ${what}`),
    groupArgs: raw.groupArgs === undefined ? undefined : stringList(raw.groupArgs, `group args of ${what}`),
    where,
  };
}

function parseTable(raw: unknown): TableDefinition {
  if (!isRecord(raw)) throw new InvalidArgument("table definition must be an object");
  const name = requiredString(raw.name, "table name");
  if (!isRecord(raw.fields)) throw new InvalidArgument(`fields of table ${name} must be an object`);

  const fields: Record<string, Datatype> = {};
  for (const [column, datatype] of Object.entries(raw.fields)) {
    if (typeof datatype !== "string" || !isDatatype(datatype)) {
      throw new InvalidArgument(`column ${column} of table ${name} has unknown datatype ${String(datatype)}`);
    }
    fields[column] = datatype;
  }

  const queries = raw.continuousQueries === undefined ? [] : raw.continuousQueries;
  if (!Array.isArray(queries)) throw new InvalidArgument(`continuous queries of table ${name} must be a list`);

  return {
    name,
    fields,
    tags: stringList(raw.tags, `tags of table ${name}`),
    timeKey: optionalString(raw.timeKey, `time key of table ${name}`),
    retentionPolicy: optionalString(raw.retentionPolicy, `retention policy of table ${name}`),
    continuousQueries: queries.map((query, i) => parseTemplate(name, i, query)),
  };
}

export function parseDefinitions(raw: unknown): Definitions {
  if (!isRecord(raw) || !isRecord(raw.retentionPolicies) || !Array.isArray(raw.tables)) {
    throw new InvalidArgument("definitions need a retentionPolicies object and a tables list");
  }
  const retentionPolicies: Record<string, PolicyDefinition> = {};
  for (const [name, policy] of Object.entries(raw.retentionPolicies)) {
    retentionPolicies[name] = parsePolicy(name, policy);
  }
  return { retentionPolicies, tables: raw.tables.map(parseTable) };
}

// ─── Registration ───────────────────────────────────────────────────

/**
 * Declares every table of `definitions` on `database`, together with the
 * retention policies they and their continuous queries write into.
 * Continuous queries are named `cq_<table>_<index>`.
 */
export function addTableDefinitions(database: Database, definitions: Definitions = loadDefinitions()): void {
  const policies = new Map<string, RetentionPolicy>();
  for (const [name, policy] of Object.entries(definitions.retentionPolicies)) {
    policies.set(
      name,
      new RetentionPolicy({ name, database, duration: policy.duration, isDefault: policy.default ?? false }),
    );
  }

  const policy = (name: string | undefined, owner: string): RetentionPolicy => {
    if (name === undefined) return database.autogen;
    const found = policies.get(name);
    if (!found) throw new InvalidArgument(`${owner} uses undeclared retention policy ${name}`);
    return found;
  };

  for (const definition of definitions.tables) {
    const retentionPolicy = policy(definition.retentionPolicy, `table ${definition.name}`);
    database.addRetentionPolicy(retentionPolicy);

    const table = new Table({
      database,
      name: definition.name,
      fields: definition.fields,
      tags: definition.tags,
      timeKey: definition.timeKey,
      retentionPolicy,
    });
    database.addTable(table);

    (definition.continuousQueries ?? []).forEach((query, i) => {
      const target = policy(query.retentionPolicy, `continuous query ${i} of table ${definition.name}`);
      const template = new ContinuousQueryTemplate({
        fields: query.fields,
        retentionPolicy: target,
        groupTime: query.groupTime,
        groupArgs: query.groupArgs,
        where: query.template === "custom" ? query.where : undefined,
      });
      database.addContinuousQuery(template.resolve(table, `cq_${table.declaredName}_${i}`));
      database.addRetentionPolicy(target);
    });
  }
}

let cached: Definitions | undefined;

/** Bundled definitions.json, validated once */
export function loadDefinitions(): Definitions {
  if (!cached) cached = parseDefinitions(rawDefinitions);
  return cached;
}
