export interface Options {
  /** Print the listing instead of JSON. */
  text: boolean;
  /** Report eliminated loads and stores on stderr. */
  stats: boolean;
  optimize: boolean;
  help: boolean;
}

export function parseArgs(argv: string[]): Options {
  const opts: Options = {
    text: false,
    stats: false,
    optimize: true,
    help: false,
  };

  for (const arg of argv) {
    if (arg === "-t" || arg === "--text") {
      opts.text = true;
      continue;
    }
    if (arg === "-s" || arg === "--stats") {
      opts.stats = true;
      continue;
    }
    if (arg === "--no-optimize") {
      opts.optimize = false;
      continue;
    }
    if (arg === "-h" || arg === "--help") {
      opts.help = true;
      continue;
    }
    throw new Error(`Unknown option: ${arg}`);
  }

  return opts;
}

export const USAGE = `Usage: tbaa-loadstore [options] < block.json

Reads a block as JSON on stdin and writes the optimized block to stdout.

Options:
  -t, --text        Print the instruction listing instead of JSON
  -s, --stats       Report eliminated loads and stores on stderr
  --no-optimize     Pass the block through unchanged
  -h, --help        Show this help
`;
