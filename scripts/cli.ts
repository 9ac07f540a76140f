export type FlagValue = string | boolean;

export interface ParsedArgs {
  flags: Record<string, FlagValue>;
  positional: string[];
}

export interface ParseArgsOptions {
  shortBooleanFlags?: string[];
}

export function parseArgs(argv: string[], options?: ParseArgsOptions): ParsedArgs {
  const flags: Record<string, FlagValue> = {};
  const positional: string[] = [];
  const shortBooleanFlags = new Set(options?.shortBooleanFlags ?? []);

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "--") {
      positional.push(...argv.slice(i + 1));
      break;
    }
    if (arg.startsWith("--")) {
      const eqIndex = arg.indexOf("=");
      if (eqIndex !== -1) {
        flags[arg.slice(2, eqIndex)] = arg.slice(eqIndex + 1);
        continue;
      }
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith("--")) {
        flags[arg.slice(2)] = next;
        i += 1;
      } else {
        flags[arg.slice(2)] = true;
      }
      continue;
    }
    if (arg.length === 2 && arg.startsWith("-") && shortBooleanFlags.has(arg[1])) {
      flags[arg[1]] = true;
      continue;
    }
    positional.push(arg);
  }

  return { flags, positional };
}

export function rejectUnknownFlags(
  flags: Record<string, FlagValue>,
  allowed: readonly string[]
): void {
  const known = new Set(allowed);
  const unknown = Object.keys(flags).filter((key) => !known.has(key));
  if (unknown.length > 0) {
    throw new Error(`Unknown option(s): ${unknown.map((item) => `--${item}`).join(", ")}`);
  }
}

export function parseIntegerValue(
  raw: FlagValue | undefined,
  fallback: number,
  label: string,
  min?: number
): number {
  if (raw === undefined) {
    return fallback;
  }
  if (typeof raw === "boolean") {
    throw new Error(`Missing value for --${label}`);
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid value for --${label}: ${raw}`);
  }
  if (min !== undefined && parsed < min) {
    throw new Error(`--${label} must be >= ${min}`);
  }
  return parsed;
}

export function parseStringValue(
  raw: FlagValue | undefined,
  label: string
): string | undefined {
  if (raw === undefined) {
    return undefined;
  }
  if (typeof raw === "boolean") {
    throw new Error(`Missing value for --${label}`);
  }
  return raw;
}

interface ErrorWithContext extends Error {
  context: object;
}

function hasContext(error: Error): error is ErrorWithContext {
  return "context" in error && typeof error.context === "object" && error.context !== null;
}

export function reportFatalError(error: unknown): void {
  const debugStacks = process.env.CARDS_DEBUG_STACK === "1";
  if (!(error instanceof Error)) {
    console.error(`Error: ${String(error)}`);
    return;
  }
  console.error(`${error.name}: ${error.message}`);
  if (hasContext(error)) {
    console.error(`Context: ${JSON.stringify(error.context)}`);
  }
  if (debugStacks && error.stack) {
    console.error(error.stack);
  } else {
    console.error("Set CARDS_DEBUG_STACK=1 to print full stack traces.");
  }
}

export function runMain(main: () => void): void {
  try {
    main();
  } catch (error) {
    reportFatalError(error);
    process.exitCode = 1;
  }
}
