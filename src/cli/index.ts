#!/usr/bin/env node

/**
 * CLI entry point for the RUNOFF to LaTeX translator
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { convertCommand } from "./commands/convert";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("runoff2tex")
  .description("Translate RUNOFF documentation source to LaTeX")
  .version("0.1.0");

// Main translation command (default action)
program
  .argument("[input]", "RUNOFF source file (reads stdin when omitted)")
  .option("-o, --output <path>", "Write LaTeX to a file instead of stdout")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--body-only", "Omit \\documentclass and the document environment")
  .option("--stats <path>", "Write run statistics as JSON")
  .option("-v, --verbose", "Verbose output")
  .action(convertCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

program.parse();
