import type { GraphFragment, Row } from "@/lib/contracts";
import { QuerySyntaxError } from "@/server/errors";

export type GraphRunOptions = {
  maxRows: number;
  params?: Record<string, unknown>;
};

export type GraphQueryResult = {
  rows: Row[];
  rowCount: number;
  truncated: boolean;
  fragment: GraphFragment;
};

/**
 * Read-only access to the pathway graph. Implementations own their connection
 * pool and apply their own per-call timeout.
 */
export interface GraphStore {
  run(statement: string, options: GraphRunOptions): Promise<GraphQueryResult>;
  schema(): Promise<string>;
  listPathways(): Promise<string[]>;
  close(): Promise<void>;
}

const stringLiteralPattern = /'(?:\\.|[^'\\])*'|"(?:\\.|[^"\\])*"|`(?:[^`])*`/g;
const lineCommentPattern = /\/\/[^\n]*/g;
const writeClausePatterns: Array<[RegExp, string]> = [
  [/\bCREATE\b/i, "CREATE"],
  [/\bMERGE\b/i, "MERGE"],
  [/\bDELETE\b/i, "DELETE"],
  [/\bSET\b/i, "SET"],
  [/\bREMOVE\b/i, "REMOVE"],
  [/\bDROP\b/i, "DROP"],
  [/\bLOAD\s+CSV\b/i, "LOAD CSV"],
  [/\bFOREACH\b/i, "FOREACH"],
  [/\bIN\s+TRANSACTIONS\b/i, "CALL ... IN TRANSACTIONS"],
];

export function findWriteClause(statement: string): string | null {
  const code = statement.replace(stringLiteralPattern, "''").replace(lineCommentPattern, "");
  for (const [pattern, clause] of writeClausePatterns) {
    if (pattern.test(code)) return clause;
  }
  return null;
}

export function assertReadOnlyStatement(statement: string): void {
  if (!statement.trim()) {
    throw new QuerySyntaxError("Empty graph query");
  }
  const clause = findWriteClause(statement);
  if (clause) {
    throw new QuerySyntaxError(`Graph queries must be read-only; found ${clause}`, {
      statement,
    });
  }
}
