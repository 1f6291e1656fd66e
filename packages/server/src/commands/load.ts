import { Command, InvalidArgumentError } from "commander";
import type { ElementReference } from "@plugin-catalog/core";
import type { LoadElementsResult } from "../transport/serialize.js";
import { createContext, printJson } from "./context.js";

/**
 * Parse "<category>:<name>". The name may itself contain colons.
 */
export function parseElementReference(value: string): ElementReference {
  const separator = value.indexOf(":");
  if (separator <= 0 || separator === value.length - 1) {
    throw new InvalidArgumentError(`Expected <category>:<name>, got '${value}'.`);
  }
  return {
    category: value.slice(0, separator),
    name: value.slice(separator + 1),
  };
}

function collectReference(value: string, previous: ElementReference[] = []): ElementReference[] {
  return [...previous, parseElementReference(value)];
}

export function createLoadCommand(): Command {
  return new Command("load")
    .description("Load elements from a plugin, e.g. load my-plugin skills:pdf agents:reviewer")
    .argument("<plugin>", "Plugin name")
    .argument("<elements...>", "Element references as <category>:<name>", collectReference)
    .action(
      async (pluginName: string, elements: ElementReference[], _options: object, command: Command) => {
        const { catalog } = createContext(command);
        const result: LoadElementsResult = {
          pluginName,
          elements: await catalog.loadElements(pluginName, elements),
        };
        printJson(result);
      }
    );
}
