import neo4j, {
  Neo4jError,
  isInt,
  isNode,
  isPath,
  isRelationship,
  type Node,
  type Path,
  type Relationship,
} from "neo4j-driver";
import type { JsonValue, Row } from "@/lib/contracts";
import { appConfig } from "@/server/config";
import { ConnectionError, QuerySyntaxError, QueryTimeoutError } from "@/server/errors";
import { fragmentFromRows } from "@/server/graph/fragment";
import type { GraphQueryResult, GraphRunOptions, GraphStore } from "@/server/graph/store";
import { logEvent, toErrorMessage } from "@/server/telemetry";

type Neo4jStoreOptions = {
  uri?: string;
  user?: string;
  password?: string;
  database?: string;
  queryTimeoutMs?: number;
  driver?: SessionSource;
};

type ReadRecords = { records: ReadonlyArray<{ toObject(): Record<string, unknown> }> };

/** The slice of a driver session the store uses; a neo4j-driver `Session` satisfies it. */
export type ReadSession = {
  run(statement: string, params: Record<string, unknown>, config: { timeout: number }): PromiseLike<ReadRecords>;
  close(): Promise<void>;
};

/** The slice of a neo4j-driver `Driver` the store uses. */
export type SessionSource = {
  session(config: { database?: string; defaultAccessMode: typeof neo4j.session.READ }): ReadSession;
  close(): Promise<void>;
};

type JsonObject = { [key: string]: JsonValue };

const syntaxErrorCodes = new Set([
  "Neo.ClientError.Statement.SyntaxError",
  "Neo.ClientError.Statement.SemanticError",
  "Neo.ClientError.Statement.TypeError",
  "Neo.ClientError.Statement.ArgumentError",
  "Neo.ClientError.Statement.ParameterMissing",
  "Neo.ClientError.Statement.AccessMode",
  "Neo.ClientError.Procedure.ProcedureNotFound",
  "Neo.ClientError.Procedure.ProcedureCallFailed",
]);

const timeoutErrorCodes = new Set([
  "Neo.ClientError.Transaction.TransactionTimedOut",
  "Neo.ClientError.Transaction.TransactionTimedOutClientConfiguration",
  "Neo.TransientError.Transaction.LockClientStopped",
]);

const connectionErrorCodes = new Set<string>([
  neo4j.error.SERVICE_UNAVAILABLE,
  neo4j.error.SESSION_EXPIRED,
]);

/** Maps a driver error code onto the error taxonomy; null when the code is not ours to map. */
export function classifyNeo4jError(
  code: string,
  message: string,
  statement: string,
): QuerySyntaxError | QueryTimeoutError | ConnectionError | null {
  const details = { code, statement };
  if (timeoutErrorCodes.has(code)) {
    return new QueryTimeoutError(`Graph query timed out: ${message}`, details);
  }
  if (syntaxErrorCodes.has(code) || code.startsWith("Neo.ClientError.Statement.")) {
    return new QuerySyntaxError(`Graph store rejected the query: ${message}`, details);
  }
  if (connectionErrorCodes.has(code) || code.startsWith("Neo.ClientError.Security.")) {
    return new ConnectionError(`Graph store unreachable: ${message}`, details);
  }
  return null;
}

export function toGraphStoreError(error: unknown, statement: string): Error {
  if (error instanceof Neo4jError) {
    return classifyNeo4jError(error.code, error.message, statement) ?? error;
  }
  return error instanceof Error ? error : new Error(String(error));
}

function isPlainObject(value: object): boolean {
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function nodeName(node: Node, fallback: string): string {
  for (const key of ["name", "entry_name", "kegg_name"]) {
    const value: unknown = node.properties[key];
    if (typeof value === "string" && value.trim()) return value.trim();
  }
  return fallback;
}

/**
 * Converts driver values into plain JSON rows. Nodes keep their properties plus
 * `labels`; relationships become `{ source, target, relation }` keyed by node
 * name so the rows double as a graph fragment.
 */
class RowConverter {
  private readonly names = new Map<string, string>();

  index(value: unknown): void {
    if (typeof value !== "object" || value === null) return;
    if (isNode(value)) {
      this.names.set(value.elementId, nodeName(value, value.elementId));
      return;
    }
    if (isPath(value)) {
      this.index(value.start);
      for (const segment of value.segments) this.index(segment.end);
      return;
    }
    if (Array.isArray(value)) {
      for (const item of value) this.index(item);
      return;
    }
    if (isPlainObject(value)) {
      for (const item of Object.values(value)) this.index(item);
    }
  }

  convert(value: unknown): JsonValue {
    if (value === null || value === undefined) return null;
    if (typeof value === "string" || typeof value === "boolean") return value;
    if (typeof value === "number") return Number.isFinite(value) ? value : String(value);
    if (typeof value === "bigint") {
      return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
    }
    if (typeof value !== "object") return String(value);
    if (isInt(value)) return value.inSafeRange() ? value.toNumber() : value.toString();
    if (isNode(value)) return this.convertNode(value);
    if (isRelationship(value)) return this.convertRelationship(value);
    if (isPath(value)) return this.convertPath(value);
    if (Array.isArray(value)) return value.map((item: unknown) => this.convert(item));
    if (isPlainObject(value)) {
      const out: JsonObject = {};
      for (const [key, item] of Object.entries(value)) out[key] = this.convert(item);
      return out;
    }
    // temporal and spatial values
    return String(value);
  }

  private convertNode(node: Node): JsonObject {
    const out: JsonObject = {};
    for (const [key, item] of Object.entries(node.properties)) out[key] = this.convert(item);
    out.labels = [...node.labels];
    return out;
  }

  private convertRelationship(relationship: Relationship): JsonObject {
    const out: JsonObject = {};
    for (const [key, item] of Object.entries(relationship.properties)) {
      out[key] = this.convert(item);
    }
    out.source = this.names.get(relationship.startNodeElementId) ?? relationship.startNodeElementId;
    out.target = this.names.get(relationship.endNodeElementId) ?? relationship.endNodeElementId;
    out.relation = relationship.type;
    return out;
  }

  private convertPath(path: Path): JsonObject {
    return {
      nodes: [path.start, ...path.segments.map((segment) => segment.end)].map((node) =>
        this.convertNode(node),
      ),
      edges: path.segments.map((segment) => ({
        source: nodeName(segment.start, segment.start.elementId),
        target: nodeName(segment.end, segment.end.elementId),
        relation: segment.relationship.type,
      })),
    };
  }
}

export class Neo4jGraphStore implements GraphStore {
  private readonly driver: SessionSource;
  private readonly database: string | undefined;
  private readonly timeoutMs: number;

  constructor(options: Neo4jStoreOptions = {}) {
    const uri = options.uri ?? appConfig.neo4j.uri;
    this.driver =
      options.driver ??
      neo4j.driver(
        uri,
        neo4j.auth.basic(
          options.user ?? appConfig.neo4j.user,
          options.password ?? appConfig.neo4j.password ?? "",
        ),
        { connectionAcquisitionTimeout: appConfig.neo4j.queryTimeoutMs },
      );
    this.database = options.database ?? appConfig.neo4j.database;
    this.timeoutMs = options.queryTimeoutMs ?? appConfig.neo4j.queryTimeoutMs;
  }

  async run(statement: string, options: GraphRunOptions): Promise<GraphQueryResult> {
    const startedAt = Date.now();
    const session = this.driver.session({
      database: this.database,
      defaultAccessMode: neo4j.session.READ,
    });
    try {
      // auto-commit: the driver does not retry a failed call
      const result = await session.run(statement, options.params ?? {}, { timeout: this.timeoutMs });
      const records = result.records.map((record) => record.toObject());
      const converter = new RowConverter();
      for (const record of records) converter.index(record);

      const allRows: Row[] = records.map((record) => {
        const row: Row = {};
        for (const [key, value] of Object.entries(record)) row[key] = converter.convert(value);
        return row;
      });
      const rows = allRows.slice(0, Math.max(0, options.maxRows));
      logEvent("graph.query", {
        rowCount: allRows.length,
        durationMs: Date.now() - startedAt,
      });
      return {
        rows,
        rowCount: allRows.length,
        truncated: allRows.length > rows.length,
        fragment: fragmentFromRows(allRows),
      };
    } catch (error) {
      throw toGraphStoreError(error, statement);
    } finally {
      await session.close();
    }
  }

  async schema(): Promise<string> {
    try {
      const result = await this.run("CALL apoc.meta.schema() YIELD value RETURN value", {
        maxRows: 1,
      });
      return JSON.stringify(result.rows[0]?.value ?? {});
    } catch (error) {
      if (!(error instanceof QuerySyntaxError)) throw error;
      logEvent("graph.schema_fallback", { message: toErrorMessage(error) });
    }

    const labels = await this.run("CALL db.labels() YIELD label RETURN collect(label) AS labels", {
      maxRows: 1,
    });
    const types = await this.run(
      "CALL db.relationshipTypes() YIELD relationshipType RETURN collect(relationshipType) AS types",
      { maxRows: 1 },
    );
    return JSON.stringify({
      labels: labels.rows[0]?.labels ?? [],
      relationshipTypes: types.rows[0]?.types ?? [],
      nodeProperties: ["name", "entry_name", "kegg_name", "gene_names", "pathway_ids", "pathway_titles"],
    });
  }

  async listPathways(): Promise<string[]> {
    const result = await this.run(
      "MATCH (p:Pathway) WHERE p.title IS NOT NULL RETURN DISTINCT p.title AS title ORDER BY title",
      { maxRows: 5_000 },
    );
    return result.rows
      .map((row) => row.title)
      .filter((title): title is string => typeof title === "string");
  }

  async close(): Promise<void> {
    await this.driver.close();
  }
}
