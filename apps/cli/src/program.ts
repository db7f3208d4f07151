import type { DirectoryReader } from "@dirshape/tree";
import { Command } from "commander";
import { registerConfigCommands } from "./commands/config";
import { registerTreeCommand } from "./commands/tree";

export type ProgramDeps = {
  /** Directory reader used by the tree command (defaults to node:fs) */
  reader?: DirectoryReader;
};

export function createProgram(deps: ProgramDeps = {}): Command {
  const program = new Command();

  program
    .name("dirshape")
    .description("Print a concise, colored directory tree")
    .version("0.1.0")
    .option("--format <type>", "output format: text|json|yaml|table", "text")
    .option("-v, --verbose", "verbose output")
    .option("-q, --quiet", "quiet mode");

  registerTreeCommand(program, deps.reader);
  registerConfigCommands(program);

  return program;
}
