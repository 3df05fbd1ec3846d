export class CliUsageError extends Error {
  public readonly exitCode = 2;
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export function normalizeArgv(argv: string[]): string[] {
  const out: string[] = [];
  for (const a of argv) {
    if (a.startsWith("--") && a.includes("=")) {
      const idx = a.indexOf("=");
      const key = a.slice(0, idx);
      const val = a.slice(idx + 1);
      out.push(key);
      if (val.length) out.push(val);
    } else {
      out.push(a);
    }
  }
  return out;
}

export function makeArgvHelpers(argv: string[], helpText: string) {
  const ARGV = normalizeArgv(argv);

  function hasFlag(...names: string[]): boolean {
    return names.some((n) => ARGV.includes(n));
  }

  function getArg(name: string): string | null {
    const idx = ARGV.indexOf(name);
    if (idx === -1) return null;
    const v = ARGV[idx + 1];
    if (!v || v.startsWith("--")) return null;
    return v;
  }

  function assertNoUnknownOptions(allowed: Set<string>): void {
    const args = ARGV.slice(2);
    for (const a of args) {
      if (a.startsWith("--") && !allowed.has(a)) {
        throw new CliUsageError(`Unknown option: ${a}\n\n${helpText}`);
      }
    }
  }

  function assertHasValue(flag: string): void {
    const idx = ARGV.indexOf(flag);
    if (idx === -1) return;
    const next = ARGV[idx + 1];
    if (!next || next.startsWith("--")) {
      throw new CliUsageError(`Missing value for ${flag}\n\n${helpText}`);
    }
  }

  function requireOneOf(...flags: string[]): string {
    const present = flags.filter((f) => getArg(f) !== null);
    if (present.length !== 1) {
      throw new CliUsageError(`Exactly one of ${flags.join(", ")} is required.\n\n${helpText}`);
    }
    return present[0] ?? "";
  }

  function requireArg(name: string): string {
    const v = getArg(name);
    if (v === null) throw new CliUsageError(`Missing required argument ${name}\n\n${helpText}`);
    return v;
  }

  return { ARGV, hasFlag, getArg, assertNoUnknownOptions, assertHasValue, requireOneOf, requireArg };
}
