/** Copyright © 2024-present P0 Security

This file is part of @p0security/cli

@p0security/cli is free software: you can redistribute it and/or modify it under the terms of the GNU General Public License as published by the Free Software Foundation, version 3 of the License.

@p0security/cli is distributed in the hope that it will be useful, but WITHOUT ANY WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the GNU General Public License for more details.

You should have received a copy of the GNU General Public License along with @p0security/cli. If not, see <https://www.gnu.org/licenses/>.
**/
import { defaultConfig } from "../drivers/env";
import { print1 } from "../drivers/stdio";
import { exportTemplate, writeTemplates } from "../plugins/aws/template";
import { InvalidOptionError } from "../types/errors";
import yargs from "yargs";

type ExportCommandArgs = {
  profile: string;
  arn: string;
  outDir: string;
  spec?: string;
  raw: boolean;
  maxDepth: number;
  timeout: number;
  debug?: boolean;
};

const exportArgs = (yargs: yargs.Argv) =>
  yargs
    .positional("profile", {
      type: "string",
      demandOption: true,
      describe: "Name of the AWS credentials profile to read with",
    })
    .positional("arn", {
      type: "string",
      demandOption: true,
      describe: "ARN of the resource to export",
    })
    .option("out-dir", {
      type: "string",
      default: defaultConfig.templatesDir,
      describe: "Directory to write templates to",
    })
    .option("spec", {
      type: "string",
      describe: "Path to a CloudFormation resource specification JSON file",
    })
    .option("raw", {
      type: "boolean",
      default: true,
      describe: "Also write the unexpanded API responses to <name>_raw.yml",
    })
    .option("max-depth", {
      type: "number",
      default: defaultConfig.maxDepth,
      describe: "Maximum nesting depth of expanded ARNs",
    })
    .option("timeout", {
      type: "number",
      default: defaultConfig.timeoutMillis,
      describe: "Timeout for each AWS API call, in milliseconds",
    })
    .option("debug", {
      type: "boolean",
      describe: "Print debug information.",
    });

export const exportCommand = (yargs: yargs.Argv) =>
  yargs.command(
    "export <profile> <arn>",
    "Export an AWS resource as a CloudFormation template",
    exportArgs,
    (argv) => exportAction(argv)
  );

/** Exports the resource named by an ARN, with all the resources it references
 *
 * Written file paths are printed to stdout; progress to stderr.
 */
const exportAction = async (args: ExportCommandArgs) => {
  if (!Number.isInteger(args.maxDepth) || args.maxDepth < 0) {
    throw new InvalidOptionError(
      "max-depth",
      args.maxDepth,
      "a non-negative integer"
    );
  }
  if (!Number.isFinite(args.timeout) || args.timeout <= 0) {
    throw new InvalidOptionError(
      "timeout",
      args.timeout,
      "a positive number of milliseconds"
    );
  }

  const result = await exportTemplate(args.arn, {
    profile: args.profile,
    specPath: args.spec,
    maxDepth: args.maxDepth,
    timeoutMillis: args.timeout,
    debug: args.debug,
  });

  const written = await writeTemplates(result, {
    outDir: args.outDir,
    raw: args.raw,
  });
  for (const file of written) print1(file);
};
