export interface AliasQuery {
  left: string;
  right: string;
}

export interface Options {
  input: string | undefined;
  queries: AliasQuery[];
  pureFunctions: string[];
  dump: boolean;
  verbose: boolean;
  help: boolean;
}

const parseQuery = (value: string): AliasQuery => {
  const parts = value.split(":");
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new Error(`Invalid query "${value}", expected <a>:<b>`);
  }
  return { left: parts[0], right: parts[1] };
};

export function parseArgs(argv: string[]): Options {
  const opts: Options = {
    input: undefined,
    queries: [],
    pureFunctions: [],
    dump: true,
    verbose: false,
    help: false,
  };

  const setInput = (value: string) => {
    if (opts.input !== undefined) {
      throw new Error(`Only one program can be analyzed (got ${value})`);
    }
    opts.input = value;
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "-i" || arg === "--input") {
      const value = argv[i + 1];
      if (!value) throw new Error("Missing value for -i/--input");
      setInput(value);
      i += 1;
      continue;
    }
    if (arg === "-q" || arg === "--query") {
      const value = argv[i + 1];
      if (!value) throw new Error("Missing value for -q/--query");
      opts.queries.push(parseQuery(value));
      i += 1;
      continue;
    }
    if (arg === "--pure") {
      const value = argv[i + 1];
      if (!value) throw new Error("Missing value for --pure");
      opts.pureFunctions.push(value);
      i += 1;
      continue;
    }
    if (arg === "--no-dump") {
      opts.dump = false;
      continue;
    }
    if (arg === "-v" || arg === "--verbose") {
      opts.verbose = true;
      continue;
    }
    if (arg === "-h" || arg === "--help") {
      opts.help = true;
      continue;
    }
    if (!arg.startsWith("-")) {
      setInput(arg);
      continue;
    }
    throw new Error(`Unknown option: ${arg}`);
  }

  return opts;
}

export const HELP_TEXT = `Usage: tac-alias <program.json> [options]

Options:
  -i, --input <file>    TAC program in JSON form
  -q, --query <a>:<b>   Print whether a and b may alias (repeatable)
  --pure <name>         Treat calls to <name> as non-escaping (repeatable)
  --no-dump             Do not print the points-to graph
  -v, --verbose         Report escaping values on stderr
  -h, --help            Show this help

Examples:
  tac-alias program.json
  tac-alias program.json -q a:b -q t0:c --no-dump
`;
