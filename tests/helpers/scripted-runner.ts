import { ProcessOutcome, ProcessRequest, ProcessRunner } from '../../src/toolchain/process-runner';

export type ScriptResult = Partial<ProcessOutcome> | void;
export type ScriptHandler = (request: ProcessRequest) => ScriptResult;

interface Rule {
  match: string;
  respond: ScriptHandler | Partial<ProcessOutcome>;
}

export function commandLine(request: ProcessRequest): string {
  return [request.command, ...request.args].join(' ');
}

/**
 * ProcessRunner that never spawns anything. Requests are recorded; the
 * most recently registered rule whose text occurs in the command line
 * decides the outcome. Unmatched commands succeed with no output.
 */
export class ScriptedRunner implements ProcessRunner {
  readonly requests: ProcessRequest[] = [];
  private rules: Rule[] = [];

  on(match: string, respond: ScriptHandler | Partial<ProcessOutcome>): this {
    this.rules.push({ match, respond });
    return this;
  }

  run(request: ProcessRequest): ProcessOutcome {
    this.requests.push(request);
    const line = commandLine(request);
    const rule = [...this.rules].reverse().find((r) => line.includes(r.match));
    const result = rule ? (typeof rule.respond === 'function' ? rule.respond(request) : rule.respond) : undefined;
    const partial = typeof result === 'object' ? result : {};
    return { exitCode: 0, signal: null, stdout: '', stderr: '', timedOut: false, ...partial };
  }

  commandLines(): string[] {
    return this.requests.map(commandLine);
  }

  count(match: string): number {
    return this.commandLines().filter((line) => line.includes(match)).length;
  }
}
