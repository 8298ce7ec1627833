import { parseArgs } from "util";
import { createHttpClient } from "./client.js";
import type { Fetcher } from "./client.js";

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  fetcher?: Fetcher;
}

const USAGE = [
  "USAGE",
  "  short-cli [flags] <arg>",
  "",
  "FLAGS",
  "  --http-addr   HTTP address of short-service (host:port)",
  "  --method      create, lookup (default: create)",
  ""
].join("\n");

function parse(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      "http-addr": { type: "string" },
      method: { type: "string", default: "create" }
    },
    allowPositionals: true
  });
}

function message(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Runs one create or lookup against a remote service and returns the exit code. */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  let parsed: ReturnType<typeof parse>;
  try {
    parsed = parse(argv);
  } catch (err) {
    io.stderr(`error: ${message(err)}`);
    io.stderr(USAGE);
    return 1;
  }

  const { values, positionals } = parsed;
  if (positionals.length !== 1) {
    io.stderr(USAGE);
    return 1;
  }
  const [arg] = positionals;

  const addr = values["http-addr"];
  if (!addr) {
    io.stderr("error: no remote address specified");
    return 1;
  }

  const svc = createHttpClient(addr, { fetcher: io.fetcher });

  try {
    switch (values.method) {
      case "create":
        io.stdout(await svc.create(arg));
        return 0;
      case "lookup":
        io.stdout(await svc.lookup(arg));
        return 0;
      default:
        io.stderr(`error: invalid method "${values.method}"`);
        return 1;
    }
  } catch (err) {
    io.stderr(`error: ${message(err)}`);
    return 1;
  }
}
