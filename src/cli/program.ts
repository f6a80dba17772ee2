import { Builtins, Cli } from "clipanion";
import { ReportCommand } from "./commands/report.js";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { DoctorCommand } from "./commands/doctor.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Bedrock Monitor",
    binaryName: "bedrock-monitor",
    binaryVersion: "0.1.0",
  });

  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);

  // Usage report (default command)
  cli.register(ReportCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  // Doctor
  cli.register(DoctorCommand);

  return cli;
}
