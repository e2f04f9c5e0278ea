import { spawn } from "node:child_process";
import { connect } from "node:net";
import { createLogger, errorMessage } from "@labfleet/shared";

export interface ProbeOutcome {
  ok: boolean;
  detail: string;
}

export interface ProbeContext {
  service: string;
  address: string;
  signal: AbortSignal;
}

/** Executes one check. Must settle (ok or not) when `signal` aborts. */
export interface ProbeRunner {
  check(target: string, context: ProbeContext): Promise<ProbeOutcome>;
}

export interface CommandRunnerOptions {
  shell?: string;
  /** argv prepended to the shell invocation; `{host}` becomes the service address. */
  prefix?: string[];
}

const MAX_DETAIL = 300;

function clip(text: string): string {
  const trimmed = text.trim();
  return trimmed.length > MAX_DETAIL ? `${trimmed.slice(0, MAX_DETAIL)}...` : trimmed;
}

export class CommandProbeRunner implements ProbeRunner {
  private logger = createLogger("probe-command");
  private shell: string;
  private prefix: string[];

  constructor(options: CommandRunnerOptions = {}) {
    this.shell = options.shell ?? "/bin/sh";
    this.prefix = options.prefix ?? [];
  }

  check(command: string, context: ProbeContext): Promise<ProbeOutcome> {
    const argv = [...this.prefix.map((part) => part.replaceAll("{host}", context.address)), this.shell, "-c", command];
    const [file, ...args] = argv;
    if (file === undefined) {
      return Promise.resolve({ ok: false, detail: "empty probe command" });
    }

    return new Promise((resolve) => {
      const child = spawn(file, args, { stdio: ["ignore", "pipe", "pipe"], signal: context.signal });
      const output: Buffer[] = [];

      child.stdout?.on("data", (data: Buffer) => output.push(data));
      child.stderr?.on("data", (data: Buffer) => output.push(data));

      child.on("error", (err) => {
        resolve({ ok: false, detail: errorMessage(err) });
      });

      child.on("close", (code) => {
        const text = clip(Buffer.concat(output).toString("utf-8"));
        this.logger.debug(`Probe for ${context.service} exited`, { code: code ?? "signal" });
        resolve(
          code === 0
            ? { ok: true, detail: text || "exit 0" }
            : { ok: false, detail: text || `exit ${code ?? "by signal"}` }
        );
      });
    });
  }
}

export class HttpProbeRunner implements ProbeRunner {
  async check(url: string, context: ProbeContext): Promise<ProbeOutcome> {
    try {
      const res = await fetch(url, { method: "GET", signal: context.signal, redirect: "manual" });
      await res.body?.cancel();
      return { ok: res.ok, detail: `HTTP ${res.status}` };
    } catch (err) {
      return { ok: false, detail: errorMessage(err) };
    }
  }
}

export class TcpProbeRunner implements ProbeRunner {
  check(target: string, context: ProbeContext): Promise<ProbeOutcome> {
    let host = "";
    let port = 0;
    try {
      const url = new URL(target);
      host = url.hostname;
      port = Number(url.port);
    } catch (err) {
      return Promise.resolve({ ok: false, detail: `invalid tcp target ${target}: ${errorMessage(err)}` });
    }
    if (!host || !Number.isInteger(port) || port <= 0) {
      return Promise.resolve({ ok: false, detail: `invalid tcp target ${target}` });
    }
    if (context.signal.aborted) {
      return Promise.resolve({ ok: false, detail: "aborted" });
    }

    return new Promise((resolve) => {
      const socket = connect({ host, port });
      const finish = (outcome: ProbeOutcome) => {
        context.signal.removeEventListener("abort", onAbort);
        socket.destroy();
        resolve(outcome);
      };
      const onAbort = () => finish({ ok: false, detail: "aborted" });

      context.signal.addEventListener("abort", onAbort, { once: true });
      socket.once("connect", () => finish({ ok: true, detail: `connected to ${host}:${port}` }));
      socket.once("error", (err) => finish({ ok: false, detail: err.message }));
    });
  }
}

/** Routes `http(s)://` and `tcp://` targets to their runners, everything else to the shell. */
export class DefaultProbeRunner implements ProbeRunner {
  private http: ProbeRunner;
  private tcp: ProbeRunner;
  private command: ProbeRunner;

  constructor(options: CommandRunnerOptions = {}) {
    this.http = new HttpProbeRunner();
    this.tcp = new TcpProbeRunner();
    this.command = new CommandProbeRunner(options);
  }

  check(target: string, context: ProbeContext): Promise<ProbeOutcome> {
    if (/^https?:\/\//i.test(target)) return this.http.check(target, context);
    if (/^tcp:\/\//i.test(target)) return this.tcp.check(target, context);
    return this.command.check(target, context);
  }
}
