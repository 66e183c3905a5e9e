import { parseArgs } from "node:util";
import { z } from "zod";
import { ValidationError, errorMessage } from "../utils/errors.js";

export const USAGE = `Usage: subtitle <command> [options]

Commands:
  process <file|url>     Generate subtitles for one media file (default command)
      --model <name>         whisper model
      --format <fmt>         output format (vtt, srt, txt, json, lrc)
      --output-dir <dir>     where the engine writes before the rename
      --merge                mux the subtitles into <name>_subtitled<ext>
      --threads <n>          engine threads
      --processors <n>       engine processors
  batch <dir>            Generate subtitles for every video in a directory
      --output-dir <dir>     defaults to <dir>
      --resume               skip files attempted by an interrupted run
      --concurrent           run files in parallel worker processes
      --workers <n>          worker process count
      --model <name>, --format <fmt>
  convert <file>         Convert between subtitle formats
      --to <fmt>             target format (required)
      --from <fmt>           source format, defaults to the file extension
      --output <file>        defaults to <file> with the target extension
  models [list]          List models, marking downloaded ones
  models download <name> [--force]
  models delete <name>
  formats                List supported formats
`;

const positiveInt = z.coerce.number().int().positive();

const ProcessSchema = z.object({
  command: z.literal("process"),
  input: z.string().min(1, "No input file specified"),
  model: z.string().optional(),
  format: z.string().optional(),
  outputDir: z.string().optional(),
  merge: z.boolean().default(false),
  threads: positiveInt.optional(),
  processors: positiveInt.optional(),
});

const BatchSchema = z.object({
  command: z.literal("batch"),
  inputDir: z.string().min(1, "No input directory specified"),
  outputDir: z.string().optional(),
  resume: z.boolean().default(false),
  concurrent: z.boolean().default(false),
  workers: positiveInt.optional(),
  model: z.string().optional(),
  format: z.string().optional(),
});

const ConvertSchema = z.object({
  command: z.literal("convert"),
  input: z.string().min(1, "No subtitle file specified"),
  to: z.string({ required_error: "--to is required" }).min(1),
  from: z.string().optional(),
  output: z.string().optional(),
});

const ModelsSchema = z.discriminatedUnion("action", [
  z.object({ command: z.literal("models"), action: z.literal("list") }),
  z.object({
    command: z.literal("models"),
    action: z.literal("download"),
    name: z.string({ required_error: "Model name required" }).min(1),
    force: z.boolean().default(false),
  }),
  z.object({
    command: z.literal("models"),
    action: z.literal("delete"),
    name: z.string({ required_error: "Model name required" }).min(1),
  }),
]);

export type ProcessCommand = z.infer<typeof ProcessSchema>;
export type BatchCommand = z.infer<typeof BatchSchema>;
export type ConvertCommand = z.infer<typeof ConvertSchema>;
export type ModelsCommand = z.infer<typeof ModelsSchema>;
export type Command =
  | ProcessCommand
  | BatchCommand
  | ConvertCommand
  | ModelsCommand
  | { command: "formats" }
  | { command: "help" };

const COMMANDS = new Set(["process", "batch", "convert", "models", "formats", "help"]);

function validated<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new ValidationError(`${where}${issue?.message ?? "Invalid arguments"}`);
  }
  return parsed.data;
}

const OPTIONS = {
  model: { type: "string", short: "m" },
  format: { type: "string", short: "f" },
  "output-dir": { type: "string", short: "o" },
  merge: { type: "boolean" },
  threads: { type: "string", short: "t" },
  processors: { type: "string", short: "p" },
  resume: { type: "boolean" },
  concurrent: { type: "boolean" },
  workers: { type: "string", short: "w" },
  to: { type: "string" },
  from: { type: "string" },
  output: { type: "string" },
  force: { type: "boolean" },
  help: { type: "boolean", short: "h" },
} as const;

function readArgs(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
  } catch (err) {
    throw new ValidationError(errorMessage(err));
  }
}

/** Turns `process.argv.slice(2)` into a typed command. */
export function parseCommand(argv: string[]): Command {
  const { values, positionals } = readArgs(argv);
  if (values.help || positionals.length === 0) return { command: "help" };

  // A bare path means "process"
  const [first, ...rest] = positionals;
  const command = first !== undefined && COMMANDS.has(first) ? first : "process";
  const args = command === first ? rest : positionals;

  switch (command) {
    case "process":
      return validated(ProcessSchema, {
        command,
        input: args[0] ?? "",
        model: values.model,
        format: values.format,
        outputDir: values["output-dir"],
        merge: values.merge,
        threads: values.threads,
        processors: values.processors,
      });
    case "batch":
      return validated(BatchSchema, {
        command,
        inputDir: args[0] ?? "",
        outputDir: values["output-dir"],
        resume: values.resume,
        concurrent: values.concurrent,
        workers: values.workers,
        model: values.model,
        format: values.format,
      });
    case "convert":
      return validated(ConvertSchema, {
        command,
        input: args[0] ?? "",
        to: values.to,
        from: values.from,
        output: values.output,
      });
    case "models":
      return validated(ModelsSchema, {
        command,
        action: args[0] ?? "list",
        name: args[1],
        force: values.force,
      });
    case "formats":
      return { command: "formats" };
    default:
      return { command: "help" };
  }
}
