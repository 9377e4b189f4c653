/**
 * ticketdesk command-line program
 */

import { Command, CommanderError } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import {
  encodeTicketId,
  logger,
  type TicketDraft,
  type TicketId,
  type TicketTable,
} from "@ticketdesk/sdk";
import { withTable, initTableFile, type CliTableOptions } from "./lib/store.js";
import { resolveTablePath, isVerbose } from "./lib/env.js";
import { parseGrade, parseGradeCategory, parseTicketIdArg } from "./lib/arg.js";
import { promptConfirm, type Confirm } from "./lib/io.js";
import { printJson, printLines, processOutput, type CliOutput } from "./lib/render.js";
import { CliError, mapSdkErrorToExitCode, formatCliError } from "./lib/errors.js";
import { withTiming } from "./lib/telemetry.js";
import {
  runChange,
  runEmit,
  runFind,
  runPrint,
  runRemove,
  runScan,
  runSetScannable,
  runShow,
  runStats,
} from "./commands/tickets.js";

type GlobalOptions = {
  table?: string;
  verbose?: boolean;
  quiet?: boolean;
};

export interface ProgramOptions {
  /** Where command output goes (default: the process streams) */
  output?: CliOutput;
  /** Asked before removing a ticket without --force */
  confirm?: Confirm;
  /** Random source and clock for the tables the program opens */
  tableOptions?: CliTableOptions;
}

function readVersion(): string {
  const packagePath = join(dirname(fileURLToPath(import.meta.url)), "../package.json");
  const packageJson: unknown = JSON.parse(readFileSync(packagePath, "utf-8"));
  if (
    typeof packageJson === "object" &&
    packageJson !== null &&
    "version" in packageJson &&
    typeof packageJson.version === "string"
  ) {
    return packageJson.version;
  }
  return "0.0.0";
}

function toDraft(lastName: string, firstName: string, grade: number, gradeCategory: string): TicketDraft {
  return { firstName, lastName, grade, gradeCategory };
}

/**
 * Build the command tree
 *
 * Commander errors are thrown instead of exiting the process; use run() for exit codes.
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const output = options.output ?? processOutput;
  const confirm = options.confirm ?? promptConfirm;
  const tableOptions = options.tableOptions ?? {};

  const program = new Command();

  program
    .configureOutput({
      writeOut: (str) => output.stdout(str),
      writeErr: (str) => output.stderr(str),
    })
    .exitOverride();

  program
    .name("ticketdesk")
    .description("ticketdesk - event tickets with short base-36 IDs, stored as YAML")
    .version(readVersion())
    .option("--table <path>", "Table file (default: $TICKETDESK_TABLE or ./tickets.yaml)")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  program.hook("preAction", () => {
    logger.setEnabled(program.opts<GlobalOptions>().quiet !== true);
  });

  const tablePath = (): string => resolveTablePath(program.opts<GlobalOptions>().table);

  const print = (lines: readonly string[]): void => {
    if (!program.opts<GlobalOptions>().quiet) {
      printLines(lines, output);
    }
  };

  const read = async (fn: (table: TicketTable) => string[]): Promise<void> => {
    print(await withTable(tablePath(), "read", fn, tableOptions));
  };

  const write = async (fn: (table: TicketTable) => string[]): Promise<void> => {
    print(await withTable(tablePath(), "write", fn, tableOptions));
  };

  program
    .command("init")
    .description("Create an empty table file")
    .option("--name <event>", "Event name written in the file header")
    .option("--force", "Overwrite an existing table file")
    .action(async (cmdOptions: { name?: string; force?: boolean }) => {
      await withTiming("cli.init", async () => {
        const filePath = tablePath();
        const table = await initTableFile(filePath, cmdOptions);
        print([`Initialized table "${table.name}" at ${filePath}`]);
      });
    });

  program
    .command("emit")
    .description("Issue a ticket")
    .argument("<last_name>", "Last name")
    .argument("<first_name>", "First name")
    .argument("<grade>", "Grade (9-12)", parseGrade)
    .argument("<grade_category>", "Grade category (A-F)", parseGradeCategory)
    .option("--id <ticket_id>", "Use this ticket ID instead of a random one", parseTicketIdArg)
    .option("--not-scannable", "Issue the ticket with scanning disabled")
    .action(
      async (
        lastName: string,
        firstName: string,
        grade: number,
        gradeCategory: string,
        cmdOptions: { id?: TicketId; notScannable?: boolean }
      ) => {
        await withTiming("cli.emit", () =>
          write((table) =>
            runEmit(table, toDraft(lastName, firstName, grade, gradeCategory), {
              ticketId: cmdOptions.id,
              notScannable: cmdOptions.notScannable,
            })
          )
        );
      }
    );

  program
    .command("show")
    .description("Show a ticket")
    .argument("<ticket_id>", "Ticket ID", parseTicketIdArg)
    .action(async (id: TicketId) => {
      await withTiming("cli.show", () => read((table) => runShow(table, id)));
    });

  program
    .command("scan")
    .description("Record a scan of a ticket")
    .argument("<ticket_id>", "Ticket ID", parseTicketIdArg)
    .action(async (id: TicketId) => {
      await withTiming("cli.scan", () => write((table) => runScan(table, id)));
    });

  program
    .command("rm")
    .description("Remove a ticket")
    .argument("<ticket_id>", "Ticket ID", parseTicketIdArg)
    .option("--force", "Remove without confirmation")
    .action(async (id: TicketId, cmdOptions: { force?: boolean }) => {
      await withTiming("cli.rm", async () => {
        if (!cmdOptions.force) {
          const confirmed = await confirm(`Remove ticket ${encodeTicketId(id)}? (y/N) `);
          if (!confirmed) {
            throw new CliError("Aborted by user", { exitCode: 1 });
          }
        }
        await write((table) => runRemove(table, id));
      });
    });

  program
    .command("change")
    .description("Replace the names and class of a ticket")
    .argument("<ticket_id>", "Ticket ID", parseTicketIdArg)
    .argument("<last_name>", "Last name")
    .argument("<first_name>", "First name")
    .argument("<grade>", "Grade (9-12)", parseGrade)
    .argument("<grade_category>", "Grade category (A-F)", parseGradeCategory)
    .action(
      async (
        id: TicketId,
        lastName: string,
        firstName: string,
        grade: number,
        gradeCategory: string
      ) => {
        await withTiming("cli.change", () =>
          write((table) => runChange(table, id, toDraft(lastName, firstName, grade, gradeCategory)))
        );
      }
    );

  program
    .command("disable")
    .description("Stop a ticket from being scanned")
    .argument("<ticket_id>", "Ticket ID", parseTicketIdArg)
    .action(async (id: TicketId) => {
      await withTiming("cli.disable", () => write((table) => runSetScannable(table, id, false)));
    });

  program
    .command("enable")
    .description("Allow a ticket to be scanned again")
    .argument("<ticket_id>", "Ticket ID", parseTicketIdArg)
    .action(async (id: TicketId) => {
      await withTiming("cli.enable", () => write((table) => runSetScannable(table, id, true)));
    });

  program
    .command("find")
    .description("Find tickets by name")
    .argument("<first_name>", "First name")
    .argument("<last_name>", "Last name")
    .action(async (firstName: string, lastName: string) => {
      await withTiming("cli.find", () => read((table) => runFind(table, firstName, lastName)));
    });

  program
    .command("print")
    .description("Print the ticket roster per class")
    .action(async () => {
      await withTiming("cli.print", () => read((table) => runPrint(table)));
    });

  program
    .command("stats")
    .description("Show table statistics")
    .option("--json", "Output as JSON")
    .action(async (cmdOptions: { json?: boolean }) => {
      await withTiming("cli.stats", async () => {
        if (cmdOptions.json) {
          const stats = await withTable(tablePath(), "read", (table) => table.stats(), tableOptions);
          if (!program.opts<GlobalOptions>().quiet) {
            printJson(stats, output);
          }
          return;
        }
        await read((table) => runStats(table));
      });
    });

  return program;
}

/**
 * Parse argv and run the selected command
 * @param argv - Full process argv (node executable and script first)
 * @returns Process exit code
 */
export async function run(argv: readonly string[], options: ProgramOptions = {}): Promise<number> {
  const output = options.output ?? processOutput;
  const program = createProgram(options);

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err) {
    // Commander already reported its own parse errors (and printed help or version)
    if (err instanceof CommanderError) {
      return err.exitCode;
    }

    const verbose = program.opts<GlobalOptions>().verbose === true || isVerbose();
    output.stderr(`Error: ${formatCliError(err, verbose)}\n`);
    return mapSdkErrorToExitCode(err);
  }
}
