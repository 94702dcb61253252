#!/usr/bin/env node
import React from "react";
import { render } from "ink";
import { CommanderError } from "commander";
import { App } from "./app.js";
import { loadConfig, type AppConfig } from "./config.js";
import { UserInputError } from "./errors.js";
import { initLogger } from "./logger.js";

function readConfig(): AppConfig {
  try {
    return loadConfig(process.argv.slice(2));
  } catch (err) {
    // commander has already printed its usage or error text
    if (err instanceof CommanderError) process.exit(err.exitCode);
    if (err instanceof UserInputError) {
      console.error(`prompter: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

const config = readConfig();

const log = initLogger({ level: config.logLevel, file: config.logFile });
log.info({ root: config.rootDir, preset: config.extensionPreset }, "starting");

const { waitUntilExit } = render(<App config={config} />);
await waitUntilExit();
log.info("exiting");
