import { DEFAULT_BATCH_CONCURRENCY } from "@/lib/engine";
import { TumorboardError } from "@/lib/errors";
import { DEFAULT_VALIDATION_CONCURRENCY } from "@/lib/validation";

export class CliUsageError extends TumorboardError {}

type Common = { model?: string; verbose: boolean };

export type CliCommand =
  | ({ kind: "assess"; gene: string; variant: string; tumorType: string; output?: string } & Common)
  | ({ kind: "batch"; input: string; output: string; maxConcurrent: number } & Common)
  | ({ kind: "validate"; goldStandard: string; output?: string; maxConcurrent: number } & Common)
  | { kind: "version" }
  | { kind: "help" };

export const DEFAULT_BATCH_OUTPUT = "results.json";

export const usage = `tumorboard: clinical actionability assessment for cancer variants

Usage:
  tumorboard assess <gene> <variant> --tumor <type> [--output <file>]
  tumorboard batch <variants.json> [--output ${DEFAULT_BATCH_OUTPUT}] [--max-concurrent ${DEFAULT_BATCH_CONCURRENCY}]
  tumorboard validate <gold_standard.json> [--output <file>] [--max-concurrent ${DEFAULT_VALIDATION_CONCURRENCY}]
  tumorboard version

Options:
  -t, --tumor <type>          Tumor type (assess only)
  -o, --output <file>         Write JSON results to a file
  -c, --max-concurrent <n>    Concurrent assessments
  -m, --model <name>          Completion model (default: TUMORBOARD_MODEL or openai/gpt-4o-mini)
  -v, --verbose               Debug logging
  -h, --help                  Show this message

Env vars:
  OPENROUTER_API_KEY (comma-separated keys rotate)
  TUMORBOARD_MODEL, TUMORBOARD_TEMPERATURE, TUMORBOARD_MAX_TOKENS
  MYVARIANT_BASE, COMPLETIONS_PER_MINUTE
  UPSTASH_REDIS_REST_URL, UPSTASH_REDIS_REST_TOKEN
`;

function positiveInt(name: string, raw: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) {
    throw new CliUsageError(`${name} must be a positive integer, got "${raw}"`);
  }
  return n;
}

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const args = [...argv];
  const next = (name: string): string => {
    const value = args.shift();
    if (value === undefined || value.startsWith("-")) {
      throw new CliUsageError(`Missing value for ${name}`);
    }
    return value;
  };

  const positional: string[] = [];
  let tumorType: string | undefined;
  let output: string | undefined;
  let maxConcurrent: number | undefined;
  let model: string | undefined;
  let verbose = false;

  while (args.length > 0) {
    const arg = args.shift();
    if (arg === undefined) break;
    switch (arg) {
      case "--tumor":
      case "-t":
        tumorType = next("--tumor");
        break;
      case "--output":
      case "-o":
        output = next("--output");
        break;
      case "--max-concurrent":
      case "-c":
        maxConcurrent = positiveInt("--max-concurrent", next("--max-concurrent"));
        break;
      case "--model":
      case "-m":
        model = next("--model").trim() || undefined;
        break;
      case "--verbose":
      case "-v":
        verbose = true;
        break;
      case "--help":
      case "-h":
        return { kind: "help" };
      default:
        if (arg.startsWith("-")) throw new CliUsageError(`Unknown argument: ${arg}`);
        positional.push(arg);
    }
  }

  const [command, ...rest] = positional;
  const expect = (count: number, shape: string) => {
    if (rest.length !== count) throw new CliUsageError(`Usage: tumorboard ${command} ${shape}`);
  };

  switch (command) {
    case "assess": {
      expect(2, "<gene> <variant> --tumor <type>");
      if (!tumorType) throw new CliUsageError("assess requires --tumor <type>");
      const [gene, variant] = rest;
      return { kind: "assess", gene, variant, tumorType, output, model, verbose };
    }
    case "batch":
      expect(1, "<variants.json>");
      return {
        kind: "batch",
        input: rest[0],
        output: output ?? DEFAULT_BATCH_OUTPUT,
        maxConcurrent: maxConcurrent ?? DEFAULT_BATCH_CONCURRENCY,
        model,
        verbose,
      };
    case "validate":
      expect(1, "<gold_standard.json>");
      return {
        kind: "validate",
        goldStandard: rest[0],
        output,
        maxConcurrent: maxConcurrent ?? DEFAULT_VALIDATION_CONCURRENCY,
        model,
        verbose,
      };
    case "version":
      return { kind: "version" };
    case undefined:
      return { kind: "help" };
    default:
      throw new CliUsageError(`Unknown command: ${command}`);
  }
}
