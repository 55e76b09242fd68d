import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { z } from "zod";
import type { ParsedArguments } from "./types.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

const MAX_SEED = 0xffffffff;

const PackageJsonSchema = z.object({ version: z.string() });

export function getPackageVersion(): string {
  const packageJsonPath = join(__dirname, "..", "package.json");
  return PackageJsonSchema.parse(JSON.parse(readFileSync(packageJsonPath, "utf-8"))).version;
}

const SHORT_ALIASES: Record<string, string> = {
  "-nw": "--no_weekends",
  "-mc": "--max_commits",
  "-fr": "--frequency",
  "-r": "--repository",
  "-un": "--user_name",
  "-ue": "--user_email",
  "-db": "--days_before",
  "-da": "--days_after",
};

const integerArgument = (name: string) =>
  z
    .string()
    .trim()
    .regex(/^[+-]?\d+$/, `${name} must be an integer`)
    .transform(Number);

// Ranges are not checked; out-of-range numbers reach the synthesizer as given.
const ArgumentsSchema = z
  .object({
    no_weekends: z.boolean().default(false),
    max_commits: integerArgument("max_commits").default("10"),
    frequency: integerArgument("frequency").default("80"),
    repository: z.string().optional(),
    user_name: z.string().optional(),
    user_email: z.string().optional(),
    days_before: integerArgument("days_before").default("365"),
    days_after: integerArgument("days_after").default("0"),
    // The seeded generator keeps 32 bits of state.
    seed: integerArgument("seed")
      .refine((seed) => seed >= 0 && seed <= MAX_SEED, `seed must be between 0 and ${MAX_SEED}`)
      .optional(),
    dry_run: z.boolean().default(false),
    strict: z.boolean().default(false),
  })
  .transform(
    (args): ParsedArguments => ({
      config: Object.freeze({
        noWeekends: args.no_weekends,
        maxCommits: args.max_commits,
        frequency: args.frequency,
        repository: args.repository,
        userName: args.user_name,
        userEmail: args.user_email,
        daysBefore: args.days_before,
        daysAfter: args.days_after,
      }),
      options: Object.freeze({
        seed: args.seed,
        dryRun: args.dry_run,
        strict: args.strict,
      }),
    })
  );

/**
 * Rewrites the two-letter short flags (`-nw`, `-mc`, ...) to their long
 * forms, which commander can parse. Arguments after `--` are left alone.
 */
export function expandShortAliases(argv: string[]): string[] {
  const expanded: string[] = [];
  let passthrough = false;

  for (const arg of argv) {
    if (passthrough || arg === "--") {
      passthrough = true;
      expanded.push(arg);
      continue;
    }

    const eq = arg.indexOf("=");
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const long = SHORT_ALIASES[flag];
    if (long === undefined) {
      expanded.push(arg);
    } else {
      expanded.push(eq === -1 ? long : `${long}${arg.slice(eq)}`);
    }
  }

  return expanded;
}

export function createProgram(): Command {
  return new Command()
    .name("contribution-history")
    .description("Generate a git repository with a synthetic, randomized commit history.")
    .version(getPackageVersion())
    .allowExcessArguments(false)
    .option("--no_weekends", "do not commit on weekends (-nw)")
    .option("--max_commits <count>", "maximum commits per day, 1-20 (-mc)", "10")
    .option("--frequency <percent>", "percentage of days to commit (-fr)", "80")
    .option("--repository <url>", "remote git repository URL in SSH or HTTPS format (-r)")
    .option("--user_name <name>", "overrides user.name git config (-un)")
    .option("--user_email <email>", "overrides user.email git config (-ue)")
    .option("--days_before <days>", "number of days before today to start commits (-db)", "365")
    .option("--days_after <days>", "number of days after today to end commits (-da)", "0")
    .option("--seed <number>", "seed the random source for a reproducible schedule")
    .option("--dry_run", "print the commit schedule without creating a repository")
    .option("--strict", "stop at the first git command that fails");
}

/**
 * Parses user arguments (without the node and script entries) into a
 * frozen configuration. Invalid integers are reported through commander's
 * error path.
 */
export function parseArguments(argv: string[], program: Command = createProgram()): ParsedArguments {
  program.parse(expandShortAliases(argv), { from: "user" });

  const result = ArgumentsSchema.safeParse(program.opts());
  if (result.success) return result.data;

  const message = result.error.issues.map((issue) => issue.message).join("; ");
  return program.error(`error: ${message}`);
}
