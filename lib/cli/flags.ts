export interface ParsedFlags {
  positional: string[];
  config?: string;
  quiet: boolean;
  help: boolean;
}

export function parseFlags(args: string[]): ParsedFlags {
  const positional: string[] = [];
  let config: string | undefined;
  let quiet = false;
  let help = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--config" && args[i + 1]) {
      config = args[++i];
    } else if (arg === "--quiet") {
      quiet = true;
    } else if (arg === "--help" || arg === "-h") {
      help = true;
    } else if (!arg.startsWith("-")) {
      positional.push(arg);
    }
  }

  return { positional, config, quiet, help };
}
