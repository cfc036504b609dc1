/** Copyright © 2024-present P0 Security

This file is part of @p0security/cli

@p0security/cli is free software: you can redistribute it and/or modify it under the terms of the GNU General Public License as published by the Free Software Foundation, version 3 of the License.

@p0security/cli is distributed in the hope that it will be useful, but WITHOUT ANY WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the GNU General Public License for more details.

You should have received a copy of the GNU General Public License along with @p0security/cli. If not, see <https://www.gnu.org/licenses/>.
**/
import { print2 } from "../drivers/stdio";
import { observedExit } from "../opentelemetry/otel-helpers";
import { CliError } from "../types/errors";
import { versionInfo } from "../version";
import { exportCommand } from "./export";
import { parseCommand } from "./parse";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";

const commands = [exportCommand, parseCommand];

const buildArgv = async () => {
  const { version } = await versionInfo;
  return yargs(hideBin(process.argv)).scriptName("arnexport").version(version);
};

export const getCli = async () =>
  commands
    .reduce((m, c) => c(m), await buildArgv())
    .strict()
    .demandCommand(1)
    .fail((message, error, yargs) => {
      if (error) {
        print2(error instanceof CliError ? error.message : error);
      } else {
        yargs.showHelp((help) => print2(help));
        print2(`\n${message}`);
      }
      observedExit(1, error ?? message);
    });
