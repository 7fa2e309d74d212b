import { SqlPool, SqlPoolClient, SqlResult, SqlRow } from '../db/client';

export interface RecordedQuery {
  text: string;
  values?: unknown[];
}

export type QueryResponder = (text: string, values?: unknown[]) => SqlResult | Error | undefined;

/**
 * Scripted stand-in for a `pg` pool. Every query is recorded; the responder
 * decides each result, and unmatched queries return no rows.
 */
export class FakeSqlPool implements SqlPool {
  readonly queries: RecordedQuery[] = [];
  released = 0;

  constructor(private readonly responder: QueryResponder = () => undefined) {}

  async query(text: string, values?: unknown[]): Promise<SqlResult> {
    this.queries.push({ text, values });
    const response = this.responder(text, values);
    if (response instanceof Error) throw response;
    return response ?? { rows: [], rowCount: 0 };
  }

  async connect(): Promise<SqlPoolClient> {
    return {
      query: (text, values) => this.query(text, values),
      release: () => {
        this.released++;
      },
    };
  }

  /**
   * Recorded statements with whitespace collapsed
   */
  statements(): string[] {
    return this.queries.map(query => query.text.replace(/\s+/g, ' ').trim());
  }
}

export function rows(...data: SqlRow[]): SqlResult {
  return { rows: data, rowCount: data.length };
}
