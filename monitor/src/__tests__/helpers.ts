import { InfluxConnection, QueryOptions, StatementResult, WriteOptions } from "../db/connection";
import { RowValue } from "../db/schema";

type Responder = (statement: string, opts: QueryOptions) => StatementResult[];

/** In-process stand-in for an InfluxDB server */
export class FakeInflux implements InfluxConnection {
  readonly database = "spp";
  readonly writes: Array<{ lines: string[]; opts: WriteOptions }> = [];
  readonly statements: string[] = [];
  readonly statementOptions: QueryOptions[] = [];
  initCalls = 0;
  closeCalls = 0;
  /** Throws from `write` while set */
  writeError: Error | null = null;
  private responders: Array<[RegExp, Responder]> = [];

  /** First matching pattern answers; errors thrown by the responder propagate */
  respond(pattern: RegExp, responder: Responder): void {
    this.responders.push([pattern, responder]);
  }

  async init(): Promise<void> {
    this.initCalls++;
  }

  async close(): Promise<void> {
    this.closeCalls++;
  }

  async query(statement: string, opts: QueryOptions = {}): Promise<StatementResult[]> {
    this.statements.push(statement);
    this.statementOptions.push(opts);
    for (const [pattern, responder] of this.responders) {
      if (pattern.test(statement)) return responder(statement, opts);
    }
    return [{ series: [] }];
  }

  async command(statement: string, opts: QueryOptions = {}): Promise<void> {
    await this.query(statement, opts);
  }

  async write(lines: readonly string[], opts: WriteOptions = {}): Promise<void> {
    if (this.writeError) throw this.writeError;
    this.writes.push({ lines: [...lines], opts });
  }

  get writtenLines(): string[] {
    return this.writes.flatMap((write) => write.lines);
  }
}

export function series(name: string, columns: string[], values: RowValue[][]): StatementResult[] {
  return [{ series: [{ name, columns, values }] }];
}
