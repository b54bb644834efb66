import { CrossBuildError } from "../errors.js";

export type CliFlagSpec = {
  values: readonly string[];
  booleans: readonly string[];
};

export type ParsedArgs = {
  values: Map<string, string>;
  booleans: Set<string>;
  positionals: string[];
};

function parseBoolean(name: string, raw: string): boolean {
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true") return true;
  if (v === "0" || v === "false") return false;
  throw new CrossBuildError("usage", `invalid boolean value for -${name}: ${raw}`);
}

/**
 * 同时接受 -name / --name，以及 -name value / -name=value 两种写法。
 * 布尔 flag 只接受 -name 或 -name=true|false。
 */
export function parseArgs(argv: string[], spec: CliFlagSpec): ParsedArgs {
  const values = new Map<string, string>();
  const booleans = new Set<string>();
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "--") {
      positionals.push(...argv.slice(i + 1));
      break;
    }
    if (!arg.startsWith("-") || arg === "-") {
      positionals.push(arg);
      continue;
    }

    const body = arg.replace(/^--?/, "");
    const eq = body.indexOf("=");
    const name = eq === -1 ? body : body.slice(0, eq);
    const inline = eq === -1 ? null : body.slice(eq + 1);

    if (spec.booleans.includes(name)) {
      if (inline === null || parseBoolean(name, inline)) booleans.add(name);
      else booleans.delete(name);
      continue;
    }
    if (spec.values.includes(name)) {
      if (inline !== null) {
        values.set(name, inline);
        continue;
      }
      const next = argv[i + 1];
      if (next === undefined) {
        throw new CrossBuildError("usage", `flag needs an argument: -${name}`);
      }
      values.set(name, next);
      i += 1;
      continue;
    }
    throw new CrossBuildError("usage", `flag provided but not defined: -${name}`);
  }

  return { values, booleans, positionals };
}

export function pickArg(parsed: ParsedArgs, name: string): string | null {
  return parsed.values.get(name) ?? null;
}

export function hasFlag(parsed: ParsedArgs, name: string): boolean {
  return parsed.booleans.has(name);
}
