import { Command } from "commander";
import { createContext, printJson } from "./context.js";

export function createListCommand(): Command {
  return new Command("list")
    .description("List every plugin across all marketplaces")
    .action(async (_options: object, command: Command) => {
      const { catalog } = createContext(command);
      printJson(await catalog.listPlugins());
    });
}
