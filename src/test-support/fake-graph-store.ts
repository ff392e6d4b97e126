import type { Row } from "@/lib/contracts";
import { fragmentFromRows } from "@/server/graph/fragment";
import type { GraphQueryResult, GraphRunOptions, GraphStore } from "@/server/graph/store";

type StoreResponse = Row[] | Error;

/** In-process graph store: queued responses per `run`, fixed schema and pathway list. */
export class FakeGraphStore implements GraphStore {
  readonly statements: string[] = [];
  schemaCalls = 0;
  closed = false;
  private readonly queue: StoreResponse[] = [];
  private standing: StoreResponse | null = null;
  private readonly schemaFailures: Error[] = [];

  constructor(
    private readonly options: { schema?: string; pathways?: string[] } = {},
  ) {}

  enqueue(...responses: StoreResponse[]): this {
    this.queue.push(...responses);
    return this;
  }

  always(response: StoreResponse): this {
    this.standing = response;
    return this;
  }

  async run(statement: string, options: GraphRunOptions): Promise<GraphQueryResult> {
    this.statements.push(statement);
    const response = this.queue.shift() ?? this.standing ?? [];
    if (response instanceof Error) throw response;
    const rows = response.slice(0, options.maxRows);
    return {
      rows,
      rowCount: response.length,
      truncated: response.length > rows.length,
      fragment: fragmentFromRows(response),
    };
  }

  /** The next `schema()` calls reject with these errors, in order. */
  failSchema(...errors: Error[]): this {
    this.schemaFailures.push(...errors);
    return this;
  }

  async schema(): Promise<string> {
    this.schemaCalls += 1;
    const failure = this.schemaFailures.shift();
    if (failure) throw failure;
    return this.options.schema ?? '{"Gene":{"type":"node","properties":{"name":{"type":"STRING"}}}}';
  }

  async listPathways(): Promise<string[]> {
    return this.options.pathways ?? ["Insulin signaling pathway"];
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
