import { VnScriptError } from "../../core/errors.js";

/** Parsed `--name value` pairs. Bare words and flags without a value are rejected. */
export class FlagSet {
  private readonly values = new Map<string, string>();

  static parse(args: readonly string[]): FlagSet {
    const flags = new FlagSet();
    let index = 0;
    while (index < args.length) {
      const token = args[index];
      if (!token.startsWith("--")) {
        throw new VnScriptError("CLI_ARG_FORMAT", `Unexpected argument: ${token}`);
      }
      const name = token.slice(2);
      const value = args[index + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new VnScriptError("CLI_ARG_MISSING", `Missing value for --${name}`);
      }
      flags.values.set(name, value);
      index += 2;
    }
    return flags;
  }

  names(): string[] {
    return [...this.values.keys()];
  }

  get(name: string): string | undefined {
    return this.values.get(name);
  }

  require(name: string): string {
    const value = this.values.get(name);
    if (value === undefined) {
      throw new VnScriptError("CLI_ARG_REQUIRED", `Missing required argument --${name}`);
    }
    return value;
  }
}
