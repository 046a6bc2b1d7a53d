import { Command } from "commander";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import type { ArchiveKind, LevelType } from "../lib/archive/types.js";
import {
  CDS_PRESSURE_LEVELS,
  RDA_PRESSURE_LEVELS,
  cdsVariablesFor,
  variablesFor,
} from "../lib/archive/variables.js";
import { maybeOutputJson, type VariablesJson } from "../lib/json-output.js";
import { parseArchive } from "../lib/options.js";

const LEVEL_TYPES: readonly LevelType[] = ["pl", "sfc"];

const GROUP_TITLES: Record<LevelType, string> = {
  pl: "Pressure levels",
  sfc: "Single levels",
};

/**
 * What one download fetches per level group for an archive.
 */
export function describeVariables(archive: ArchiveKind): VariablesJson {
  return {
    archive,
    groups: LEVEL_TYPES.map((levelType) => {
      if (archive === "cds") {
        return {
          levelType,
          variables: cdsVariablesFor(levelType).map((name) => ({ name })),
          ...(levelType === "pl" && { levels: [...CDS_PRESSURE_LEVELS] }),
        };
      }
      return {
        levelType,
        variables: variablesFor(levelType).map((spec) => ({
          name: spec.mnemonic,
          code: spec.code,
          description: spec.description,
        })),
        ...(levelType === "pl" && { levels: [...RDA_PRESSURE_LEVELS] }),
      };
    }),
  };
}

export function registerVariablesCommands(program: Command): void {
  program
    .command("variables")
    .description("List the variables and pressure levels each archive provides")
    .option("-a, --archive <name>", "Archive: rda or cds", "rda")
    .action((options: { archive: string }) => {
      const listing = describeVariables(parseArchive(options.archive));
      if (maybeOutputJson(listing)) return;

      for (const group of listing.groups) {
        console.log(chalk.bold(`\n${GROUP_TITLES[group.levelType]} (${listing.archive})`));

        const table = new CliTable3({
          head:
            listing.archive === "rda"
              ? [chalk.cyan("Name"), chalk.cyan("Code"), chalk.cyan("Description")]
              : [chalk.cyan("Request name")],
          style: { head: [], border: [] },
        });
        for (const variable of group.variables) {
          table.push(
            listing.archive === "rda"
              ? [variable.name, variable.code ?? "", variable.description ?? ""]
              : [variable.name]
          );
        }
        console.log(table.toString());

        if (group.levels) {
          console.log(chalk.gray(`Levels (hPa): ${group.levels.join(", ")}`));
        }
      }

      if (listing.archive === "rda") {
        console.log(chalk.gray("\nSelect a subset with --vars, e.g. --vars Z,T,2T"));
      }
    });
}
