#!/usr/bin/env node
import { AppConfig, loadConfig } from "./src/config";
import { createConsolePrompter } from "./src/commands/context";
import { parseCommandKind, runCommand } from "./src/commands/router";
import { createPainter } from "./src/render/painter";
import { RosterStore } from "./src/store/roster";
import { CommandKind } from "./src/types";

async function main(): Promise<number> {
  console.log("\nGlobal Football CLI\n============================");

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    return 1;
  }

  let kind: CommandKind;
  try {
    kind = parseCommandKind(process.argv.slice(2), config.settings.defaultCommand);
  } catch (error) {
    console.error(`Problem parsing arguments: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  const prompter = createConsolePrompter();
  try {
    return await runCommand(kind, {
      settings: config.settings,
      api: { apiKey: config.apiKey, host: config.apiHost },
      roster: new RosterStore(),
      colorsPath: config.colorsPath,
      paint: createPainter(),
      out: console,
      prompt: prompter
    });
  } finally {
    prompter.close();
  }
}

process.on("unhandledRejection", (reason: unknown) => {
  console.error("Unhandled promise rejection", reason);
});

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error(error);
    process.exitCode = 1;
  });
