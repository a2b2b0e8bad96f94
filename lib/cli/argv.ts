// Minimal flag helpers: "--flag", "--key value" and "--key=value"

export function hasFlag(argv: readonly string[], flag: string): boolean {
  return argv.includes(flag);
}

export function getFlagValue(argv: readonly string[], flag: string): string | null {
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === flag) {
      const next = argv[i + 1];
      return next !== undefined && !next.startsWith("--") ? next : null;
    }
    if (a.startsWith(flag + "=")) return a.slice(flag.length + 1);
  }
  return null;
}

export function getVerboseFlag(argv: readonly string[]): boolean {
  return hasFlag(argv, "--verbose") || hasFlag(argv, "-v");
}
