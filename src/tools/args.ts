import { parseMaxDepth } from "./config.js";

export interface CliArgs {
  command: string | undefined;
  positional: string[];
  schema?: string;
  out?: string;
  exact?: boolean;
  maxDepth?: number;
  help: boolean;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { command: argv[0], positional: [], help: false };

  for (let i = 1; i < argv.length; i++) {
    const a = argv[i];
    const value = (): string => {
      const v = argv[++i];
      if (v === undefined || v.startsWith("-")) throw new Error(`${a} needs a value`);
      return v;
    };

    if (a === "-o" || a === "--out") {
      args.out = value();
    } else if (a === "-s" || a === "--schema") {
      args.schema = value();
    } else if (a === "--max-depth") {
      args.maxDepth = parseMaxDepth(value(), "--max-depth");
    } else if (a === "--exact") {
      args.exact = true;
    } else if (a === "-h" || a === "--help") {
      args.help = true;
    } else if (a.startsWith("-")) {
      throw new Error(`unknown option: ${a}`);
    } else {
      args.positional.push(a);
    }
  }

  if (args.command === "-h" || args.command === "--help") {
    args.command = undefined;
    args.help = true;
  }
  return args;
}
