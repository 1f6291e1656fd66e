import { Command } from "commander";
import { serializePluginDetail } from "../transport/serialize.js";
import { createContext, printJson } from "./context.js";

export function createDescribeCommand(): Command {
  return new Command("describe")
    .description("Show a plugin's full definition")
    .argument("<name>", "Plugin name")
    .action(async (name: string, _options: object, command: Command) => {
      const { catalog } = createContext(command);
      printJson(serializePluginDetail(await catalog.describePlugin(name)));
    });
}
