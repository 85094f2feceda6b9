#!/usr/bin/env tsx

import { Cli } from "clipanion";

import { ReportCommand } from "./lib/report_command";

const cli = new Cli({
  binaryLabel: "Active incident report",
  binaryName: "incident-report",
  binaryVersion: "0.1.0",
});
cli.register(ReportCommand);
void cli.runExit(process.argv.slice(2));
