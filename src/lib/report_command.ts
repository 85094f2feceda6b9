import { Command, Option } from "clipanion";

import { loadJsonFileSource } from "../features/incidents/source";
import { parseReportOptions } from "./config";
import { DiagnosticsLog } from "./diagnostics";
import { describeFailure } from "./error_guidance";
import { generateReport } from "./report_flow";

type TextSink = { write(text: string): unknown };

export type RunReportFlags = {
  input?: string;
  output?: string;
  title?: string;
  sort?: string;
  descending?: boolean;
  classification?: string;
  tierQueue?: string;
  language?: string;
  quiet?: boolean;
};

export type RunReportIo = {
  stdout: TextSink;
  stderr: TextSink;
  now?: () => Date;
};

/** Exit code 0 with the written path on stdout, or 1 with the failure on stderr. */
export async function runReport(flags: RunReportFlags, io: RunReportIo): Promise<number> {
  const log = new DiagnosticsLog({ echo: !flags.quiet });
  try {
    const { input, ...settings } = parseReportOptions({
      input: flags.input,
      output: flags.output,
      title: flags.title,
      sort: flags.sort,
      direction: flags.descending ? "descending" : "ascending",
      classification: flags.classification,
      tierQueue: flags.tierQueue,
      language: flags.language,
    });
    const source = await loadJsonFileSource(input);
    const result = await generateReport({ source, options: settings, log, now: io.now });
    io.stdout.write(`${result.outputPath}\n`);
    return 0;
  } catch (err) {
    io.stderr.write(`${describeFailure(err)}\n`);
    return 1;
  }
}

export class ReportCommand extends Command {
  static paths = [["report"], Command.Default];

  static usage = Command.Usage({
    description: "Render the active incidents of an export into a standalone, filterable HTML report",
    examples: [
      ["Swedish report sorted by creation date", "incident-report --input export.json --output out/report.html"],
      ["English report of hardware incidents, newest first", "incident-report -i export.json -o report.html --language en --classification 'Hardware*' --descending"],
    ],
  });

  input = Option.String("--input,-i", { required: true, description: "Incident export (JSON)" });
  output = Option.String("--output,-o", { required: true, description: "HTML file to write" });
  title = Option.String("--title", { description: "Report title; defaults to the localized title" });
  sort = Option.String("--sort", { description: "Sort key: id, createdDate or title" });
  descending = Option.Boolean("--descending", false, { description: "Sort in descending order" });
  classification = Option.String("--classification", { description: "Wildcard pattern (* and ?) on the classification" });
  tierQueue = Option.String("--tier-queue", { description: "Wildcard pattern (* and ?) on the tier/queue" });
  language = Option.String("--language", { description: "UI language: sv or en" });
  quiet = Option.Boolean("--quiet,-q", false, { description: "Do not echo progress to the console" });

  async execute(): Promise<number> {
    return runReport(
      {
        input: this.input,
        output: this.output,
        title: this.title,
        sort: this.sort,
        descending: this.descending,
        classification: this.classification,
        tierQueue: this.tierQueue,
        language: this.language,
        quiet: this.quiet,
      },
      { stdout: this.context.stdout, stderr: this.context.stderr }
    );
  }
}
