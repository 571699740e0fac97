#!/usr/bin/env node

/**
 * CLI entry point for the page image harvester
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { harvestCommand } from "./commands/harvest";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("harvest-images")
  .description("Harvest, mix and rotate images referenced by a list of webpages")
  .version("0.1.0");

// Main harvest command (default action)
program
  .option("-i, --input <path>", "File listing one webpage URL per line")
  .option("-n, --count <number>", "Number of images to store")
  .option("--originals <path>", "Directory for downloaded originals")
  .option("-o, --output <path>", "Directory for rotated images")
  .option("-t, --timeout <ms>", "Per-request timeout in milliseconds")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output")
  .action(harvestCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
