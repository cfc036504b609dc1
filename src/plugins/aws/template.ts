/** Copyright © 2024-present P0 Security

This file is part of @p0security/cli

@p0security/cli is free software: you can redistribute it and/or modify it under the terms of the GNU General Public License as published by the Free Software Foundation, version 3 of the License.

@p0security/cli is distributed in the hope that it will be useful, but WITHOUT ANY WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the GNU General Public License for more details.

You should have received a copy of the GNU General Public License along with @p0security/cli. If not, see <https://www.gnu.org/licenses/>.
**/
import { defaultConfig } from "../../drivers/env";
import { print2 } from "../../drivers/stdio";
import { ExpansionContext, expandArn } from "./expand";
import { fetchResource } from "./fetch";
import { loadResourceSpecification } from "./resource-spec";
import type {
  AwsSession,
  FetchedResource,
  FetchOperations,
  ParsedArn,
  TemplateDocument,
} from "./types";
import { parseArn, resourceDisplayName } from "./utils";
import fs from "node:fs/promises";
import path from "node:path";
import { stringify } from "yaml";

export type ExportOptions = {
  profile: string;
  specPath?: string;
  maxDepth?: number;
  timeoutMillis?: number;
  defaultRegion?: string;
  operations?: FetchOperations;
  debug?: boolean;
};

export type ExportResult = {
  descriptor: string;
  template: TemplateDocument;
  raw: TemplateDocument<FetchedResource>;
};

/** Names an exported template, e.g. `myFunction_lambda_function` */
export const templateDescriptor = (parsed: ParsedArn) =>
  [
    resourceDisplayName(parsed),
    parsed.service ?? "",
    parsed.resourcetype ?? "",
  ].join("_");

/** Builds a CloudFormation template for the resource an ARN names
 *
 * Nothing is written; on any error no partial template is produced.
 */
export const exportTemplate = async (
  arn: string,
  options: ExportOptions
): Promise<ExportResult> => {
  const parsed = parseArn(arn);
  const specification = await loadResourceSpecification(
    options.specPath ?? defaultConfig.specPath
  );
  const session: AwsSession = {
    profile: options.profile,
    defaultRegion: options.defaultRegion ?? defaultConfig.defaultRegion,
  };

  const context = new ExpansionContext({
    specification,
    maxDepth: options.maxDepth ?? defaultConfig.maxDepth,
    fetch: (nested) =>
      fetchResource(nested, session, {
        operations: options.operations,
        timeoutMillis: options.timeoutMillis,
        debug: options.debug,
      }),
  });

  print2(`Retrieving ${arn}`);
  await expandArn(arn, context);

  const descriptor = templateDescriptor(parsed);
  const Description = `Exported ${descriptor} from ${arn}`;
  return {
    descriptor,
    template: {
      AWSTemplateFormatVersion: "2010-09-09",
      Description,
      Resources: context.resources,
    },
    raw: {
      AWSTemplateFormatVersion: "2010-09-09",
      Description,
      Resources: context.raw,
    },
  };
};

/** Writes an exported template as YAML, along with its unexpanded copy
 *
 * @returns The paths of the written files
 */
export const writeTemplates = async (
  result: ExportResult,
  options: { outDir: string; raw: boolean }
) => {
  await fs.mkdir(options.outDir, { recursive: true });

  const files: [string, object][] = [
    [`${result.descriptor}.yml`, result.template],
  ];
  if (options.raw) files.push([`${result.descriptor}_raw.yml`, result.raw]);

  const written: string[] = [];
  for (const [name, document] of files) {
    const filePath = path.join(options.outDir, name);
    print2(`Writing ${name} file`);
    await fs.writeFile(filePath, stringify(document));
    written.push(filePath);
  }
  return written;
};
