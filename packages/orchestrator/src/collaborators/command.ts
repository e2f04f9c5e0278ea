import { spawn } from "node:child_process";
import { z } from "zod";
import { createLogger, FatalApplyError, TransientApplyError } from "@labfleet/shared";
import type { ResourceKind } from "@labfleet/shared";
import type {
  ApplicationRegistration,
  ApplicationSpec,
  Collaborators,
  ConfigPayload,
  ConfigurationApplier,
  ContainerResult,
  ContainerSpec,
  IdentityProvider,
  ProvisioningBackend,
  SecretResolver,
} from "./types.js";

export interface CommandCollaboratorOptions {
  provision?: string[];
  configure?: string[];
  identity?: string[];
  /** Exit codes that mean "permanently rejected"; anything else non-zero is retried. */
  fatalExitCodes: number[];
  timeoutMs: number;
  secrets: SecretResolver;
}

interface CommandRequest {
  argv: string[] | undefined;
  service: string;
  kind: ResourceKind;
  operation: string;
  body: unknown;
}

const containerResultSchema = z.object({ id: z.string().min(1), address: z.string().min(1) });
const registrationSchema = z.object({ clientId: z.string().min(1), providerId: z.string().min(1) });

const MAX_OUTPUT = 500;

/**
 * Runs an operator-supplied command per collaborator call. The request is
 * written to stdin as JSON (`{ operation, ...body }`); a JSON response is read
 * from stdout when the exit code is 0.
 */
export class CommandInvoker {
  private logger = createLogger("command-collaborator");

  constructor(private readonly options: Pick<CommandCollaboratorOptions, "fatalExitCodes" | "timeoutMs">) {}

  invoke(request: CommandRequest): Promise<unknown> {
    const { service, kind } = request;
    const [file, ...args] = request.argv ?? [];
    if (file === undefined) {
      return Promise.reject(
        new FatalApplyError(service, kind, `No command configured for ${request.operation}`)
      );
    }

    return new Promise((resolve, reject) => {
      const child = spawn(file, args, {
        stdio: ["pipe", "pipe", "pipe"],
        timeout: this.options.timeoutMs,
        env: { ...process.env, LABFLEET_SERVICE: service, LABFLEET_OPERATION: request.operation },
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let spawnFailed = false;

      child.stdout?.on("data", (data: Buffer) => stdout.push(data));
      child.stderr?.on("data", (data: Buffer) => stderr.push(data));

      child.on("error", (err) => {
        spawnFailed = true;
        reject(new FatalApplyError(service, kind, `Cannot run ${file}: ${err.message}`, { cause: err }));
      });

      child.on("close", (code, signal) => {
        if (spawnFailed) return;
        const output = Buffer.concat(stdout).toString("utf-8");
        const errOutput = Buffer.concat(stderr).toString("utf-8").trim().slice(0, MAX_OUTPUT);

        if (code !== 0) {
          const reason = signal ? `killed by ${signal}` : `exited with code ${code}`;
          const message = `${request.operation} for ${service} ${reason}${errOutput ? `: ${errOutput}` : ""}`;
          this.logger.warn(message, { kind });
          reject(
            code !== null && this.options.fatalExitCodes.includes(code)
              ? new FatalApplyError(service, kind, message)
              : new TransientApplyError(service, kind, message)
          );
          return;
        }

        if (output.trim() === "") {
          resolve({});
          return;
        }
        try {
          resolve(JSON.parse(output));
        } catch (err) {
          reject(
            new FatalApplyError(
              service,
              kind,
              `${request.operation} for ${service} printed invalid JSON: ${output.slice(0, MAX_OUTPUT)}`,
              { cause: err }
            )
          );
        }
      });

      child.stdin?.on("error", (err) => {
        this.logger.debug(`stdin closed early for ${file}`, { error: err.message });
      });
      child.stdin?.write(JSON.stringify({ operation: request.operation, ...Object(request.body) }));
      child.stdin?.end();
    });
  }
}

function parseResponse<T>(
  schema: z.ZodType<T>,
  value: unknown,
  service: string,
  kind: ResourceKind
): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new FatalApplyError(
      service,
      kind,
      `Unexpected collaborator response: ${parsed.error.issues.map((i) => `${i.path.join(".")} ${i.message}`).join("; ")}`
    );
  }
  return parsed.data;
}

export function createCommandCollaborators(options: CommandCollaboratorOptions): Collaborators {
  const invoker = new CommandInvoker(options);

  const provisioning: ProvisioningBackend = {
    async createOrUpdate(spec: ContainerSpec): Promise<ContainerResult> {
      const response = await invoker.invoke({
        argv: options.provision,
        service: spec.service,
        kind: "container",
        operation: "createOrUpdate",
        body: { spec },
      });
      return parseResponse(containerResultSchema, response, spec.service, "container");
    },
  };

  const configuration: ConfigurationApplier = {
    async apply(serviceName: string, payload: ConfigPayload): Promise<void> {
      await invoker.invoke({
        argv: options.configure,
        service: serviceName,
        kind: "configuration_applied",
        operation: "apply",
        body: { service: serviceName, payload },
      });
    },
  };

  const identity: IdentityProvider = {
    async registerApplication(spec: ApplicationSpec): Promise<ApplicationRegistration> {
      const response = await invoker.invoke({
        argv: options.identity,
        service: spec.service,
        kind: "identity_registration",
        operation: "registerApplication",
        body: { spec },
      });
      return parseResponse(registrationSchema, response, spec.service, "identity_registration");
    },
  };

  return { provisioning, configuration, identity, secrets: options.secrets };
}
