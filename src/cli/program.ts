import { Command } from "commander";
import { registerInferenceCli } from "./inference-cli.js";
import { registerSweepCli } from "./sweep-cli.js";

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("tpg-sweep")
    .description("Parameter sweeps over TPG training, code generation and inference simulation");
  registerSweepCli(program);
  registerInferenceCli(program);
  return program;
}
