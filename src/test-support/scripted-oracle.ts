import type { Oracle, OracleOperation, OracleRequest } from "@/server/openai/oracle";
import { OracleUnavailableError } from "@/server/errors";

type ScriptedReply =
  | string
  | Error
  | ((request: OracleRequest) => string | Promise<string>);

export function json(value: unknown): string {
  return JSON.stringify(value);
}

/** In-process oracle: replies are queued per operation, with an optional standing reply. */
export class ScriptedOracle implements Oracle {
  readonly calls: OracleRequest[] = [];
  private readonly queues = new Map<OracleOperation, ScriptedReply[]>();
  private readonly standing = new Map<OracleOperation, ScriptedReply>();

  enqueue(operation: OracleOperation, ...replies: ScriptedReply[]): this {
    this.queues.set(operation, [...(this.queues.get(operation) ?? []), ...replies]);
    return this;
  }

  always(operation: OracleOperation, reply: ScriptedReply): this {
    this.standing.set(operation, reply);
    return this;
  }

  callsFor(operation: OracleOperation): OracleRequest[] {
    return this.calls.filter((call) => call.operation === operation);
  }

  async complete(request: OracleRequest): Promise<string> {
    this.calls.push(request);
    const reply = this.queues.get(request.operation)?.shift() ?? this.standing.get(request.operation);
    if (reply === undefined) {
      throw new OracleUnavailableError(`no scripted reply for ${request.operation}`);
    }
    if (reply instanceof Error) throw reply;
    if (typeof reply === "function") return reply(request);
    return reply;
  }
}
