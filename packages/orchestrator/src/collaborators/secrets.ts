import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import type { SecretResolver } from "./types.js";

/**
 * Resolves `env:NAME` from the process environment and `file:/path` from the
 * first line of a file (the shape secret managers render into tmpfs).
 */
export class EnvFileSecretResolver implements SecretResolver {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async resolve(ref: string): Promise<string> {
    const separator = ref.indexOf(":");
    const scheme = separator > 0 ? ref.slice(0, separator) : "";
    const target = ref.slice(separator + 1);

    switch (scheme) {
      case "env": {
        const value = this.env[target];
        if (value === undefined || value === "") {
          throw new Error(`environment variable ${target} is not set`);
        }
        return value;
      }
      case "file": {
        const text = await readFile(resolve(target), "utf-8");
        const value = text.split(/\r?\n/)[0] ?? "";
        if (value === "") throw new Error(`secret file ${target} is empty`);
        return value;
      }
      default:
        throw new Error(`unsupported secret reference "${ref}" (expected env:NAME or file:/path)`);
    }
  }
}
