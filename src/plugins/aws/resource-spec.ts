/** Copyright © 2024-present P0 Security

This file is part of @p0security/cli

@p0security/cli is free software: you can redistribute it and/or modify it under the terms of the GNU General Public License as published by the Free Software Foundation, version 3 of the License.

@p0security/cli is distributed in the hope that it will be useful, but WITHOUT ANY WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the GNU General Public License for more details.

You should have received a copy of the GNU General Public License along with @p0security/cli. If not, see <https://www.gnu.org/licenses/>.
**/
import { defaultConfig } from "../../drivers/env";
import {
  InvalidResourceSpecificationError,
  UnknownResourceTypeError,
} from "../../types/errors";
import type {
  ParsedArn,
  ResolvedResourceType,
  ResourceSpecification,
} from "./types";
import { isPlainObject } from "lodash";
import fs from "node:fs/promises";

const specifications = new Map<string, Promise<ResourceSpecification>>();

const isResourceSpecification = (
  value: unknown
): value is ResourceSpecification =>
  typeof value === "object" &&
  value !== null &&
  "ResourceTypes" in value &&
  isPlainObject(value.ResourceTypes);

const parseSpecification = async (path: string): Promise<unknown> => {
  try {
    const buffer = await fs.readFile(path);
    return JSON.parse(buffer.toString("utf-8"));
  } catch (error) {
    throw new InvalidResourceSpecificationError(
      path,
      error instanceof Error ? error.message : String(error)
    );
  }
};

const readSpecification = async (path: string) => {
  const json = await parseSpecification(path);
  if (!isResourceSpecification(json)) {
    throw new InvalidResourceSpecificationError(path);
  }
  return json;
};

/** Loads the CloudFormation resource specification document
 *
 * The document is immutable for the life of the process, so each path is
 * read at most once.
 */
export const loadResourceSpecification = (
  path: string = defaultConfig.specPath
) => {
  const cached = specifications.get(path);
  if (cached) return cached;
  const loading = readSpecification(path);
  specifications.set(path, loading);
  // Don't cache failures
  void loading.catch(() => specifications.delete(path));
  return loading;
};

/** Finds the canonical CloudFormation type for an ARN's service and resource type
 *
 * Matching is case-insensitive (`AWS::lambda::function` matches
 * `AWS::Lambda::Function`); the first match in the document's declared key
 * order wins.
 */
export const resolveResourceType = (
  specification: ResourceSpecification,
  service: string,
  resourceType: string
): ResolvedResourceType | undefined => {
  const target = `AWS::${service}::${resourceType}`.toLowerCase();
  const type = Object.keys(specification.ResourceTypes).find(
    (key) => key.toLowerCase() === target
  );
  if (type === undefined) return undefined;
  return {
    type,
    properties: Object.keys(
      specification.ResourceTypes[type]?.Properties ?? {}
    ),
  };
};

export const requireResourceType = (
  specification: ResourceSpecification,
  parsed: ParsedArn
) => {
  const { service, resourcetype } = parsed;
  const resolved =
    service !== undefined && resourcetype !== undefined
      ? resolveResourceType(specification, service, resourcetype)
      : undefined;
  if (!resolved) throw new UnknownResourceTypeError(service, resourcetype);
  return resolved;
};
