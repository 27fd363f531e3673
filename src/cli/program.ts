import { Command } from "commander";
import { BRIDGE_NAME, DEFAULT_LOG_FORMAT, DEFAULT_LOG_LEVEL } from "../shared/constants.js";
import { runCall } from "./commands/call.js";
import { runModules } from "./commands/modules.js";
import { runServe } from "./commands/serve.js";
import { getPackageJsonVersion } from "./utils.js";

function withBridgeOptions(command: Command): Command {
  return command
    .option("--config <path>", "JSON config file")
    .option("--module <name=path...>", "Register the exported functions of an ES module under a name")
    .option("--no-arrays", "Disable typed array support")
    .option("--no-tables", "Disable tabular frame support")
    .option("-v, --verbose", "Verbose logging")
    .option("--log-level <level>", `Log level: error, warn, info, debug (default ${DEFAULT_LOG_LEVEL})`)
    .option("--log-format <format>", `Log format: text, json or plain (default ${DEFAULT_LOG_FORMAT})`);
}

export function createProgram(): Command {
  const program = new Command();

  withBridgeOptions(
    program
      .name(BRIDGE_NAME)
      .description("Line-oriented JSON bridge: one request per stdin line, one response per stdout line")
      .version(getPackageJsonVersion())
      .enablePositionalOptions()
  ).action((opts: Record<string, unknown>) => runServe(opts));

  withBridgeOptions(
    program.command("modules").description("List registered modules and their functions")
  ).action((opts: Record<string, unknown>) => runModules(opts));

  withBridgeOptions(
    program
      .command("call")
      .description("Run one request and print the response line")
      .argument("<module>", "Module name")
      .argument("<function>", "Function name")
      .argument("[args...]", "Positional arguments, each parsed as JSON or taken as a string")
      .option("--kwargs <json>", "Keyword arguments as a JSON object")
  ).action((module: string, fn: string, args: string[], opts: Record<string, unknown>) =>
    runCall(module, fn, args, opts)
  );

  return program;
}
