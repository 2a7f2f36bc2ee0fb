import { Command } from "commander";

import { registerVerifyCommand } from "./verify.js";
import { registerListCommand } from "./list.js";

export function registerAllCommands(program: Command) {
  registerVerifyCommand(program);
  registerListCommand(program);
}
