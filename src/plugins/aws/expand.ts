/** Copyright © 2024-present P0 Security

This file is part of @p0security/cli

@p0security/cli is free software: you can redistribute it and/or modify it under the terms of the GNU General Public License as published by the Free Software Foundation, version 3 of the License.

@p0security/cli is distributed in the hope that it will be useful, but WITHOUT ANY WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the GNU General Public License for more details.

You should have received a copy of the GNU General Public License along with @p0security/cli. If not, see <https://www.gnu.org/licenses/>.
**/
import { print2 } from "../../drivers/stdio";
import {
  ResourceNameCollisionError,
  UnknownResourceTypeError,
} from "../../types/errors";
import { requireResourceType } from "./resource-spec";
import type {
  FetchedResource,
  ParsedArn,
  Reference,
  ResourceSpecification,
  TemplateResource,
} from "./types";
import { isRecord, parseArn, resourceDisplayName } from "./utils";

/** Values containing this are treated as nested ARNs */
const NESTED_ARN_MARKER = "arn:aws";

export type ExpansionOptions = {
  specification: ResourceSpecification;
  fetch: (parsed: ParsedArn) => Promise<FetchedResource>;
  /** Nested ARNs deeper than this are left as raw ARN strings */
  maxDepth: number;
};

/** Finds the first value stored under `key` anywhere in a fetched resource
 *
 * Traversal is pre-order and depth-first over nested objects, in insertion
 * order: each entry's key is compared before its value is descended into.
 * Arrays are treated as leaf values. `null` and `undefined` count as absent.
 */
export const findPropertyValue = (
  resource: Record<string, unknown>,
  key: string
): unknown => {
  for (const [entryKey, value] of Object.entries(resource)) {
    if (entryKey === key && value !== null && value !== undefined) return value;
    if (isRecord(value)) {
      const found = findPropertyValue(value, key);
      if (found !== undefined) return found;
    }
  }
  return undefined;
};

/** Accumulates the resources of one exported template
 *
 * Every ARN is fetched at most once; an ARN seen again (including one of
 * its own ancestors) resolves to the resource already created for it.
 */
export class ExpansionContext {
  readonly resources: Record<string, TemplateResource> = {};
  readonly raw: Record<string, FetchedResource> = {};
  private readonly namesByArn = new Map<string, string>();
  private readonly arnsByName = new Map<string, string>();

  constructor(readonly options: ExpansionOptions) {}

  nameOf(arn: string) {
    return this.namesByArn.get(arn);
  }

  /** Claims a resource name for an ARN and registers an empty resource */
  register(arn: string, name: string, type: string): TemplateResource {
    const owner = this.arnsByName.get(name);
    if (owner !== undefined) {
      throw new ResourceNameCollisionError(name, owner, arn);
    }
    this.namesByArn.set(arn, name);
    this.arnsByName.set(name, arn);
    const resource: TemplateResource = { Type: type, Properties: {} };
    this.resources[name] = resource;
    return resource;
  }
}

/** Expands a nested ARN property into a reference to a sibling resource
 *
 * ARNs already in the template always become references. Otherwise ARNs of
 * types missing from the resource specification, and ARNs nested beyond the
 * maximum depth, are kept as raw strings.
 */
const expandNestedArn = async (
  arn: string,
  context: ExpansionContext,
  depth: number
): Promise<Reference | string> => {
  const known = context.nameOf(arn);
  if (known !== undefined) return { Ref: known };
  if (depth > context.options.maxDepth) {
    print2(
      `Warning: not expanding ${arn}; it is nested deeper than ${context.options.maxDepth} levels`
    );
    return arn;
  }
  try {
    return { Ref: await expandArn(arn, context, depth) };
  } catch (error) {
    if (!(error instanceof UnknownResourceTypeError)) throw error;
    print2(`Warning: not expanding ${arn}: ${error.message}`);
    return arn;
  }
};

/** Converts an ARN into a template resource, expanding nested ARNs
 *
 * @returns The name of the resource in {@link ExpansionContext.resources}
 */
export const expandArn = async (
  arn: string,
  context: ExpansionContext,
  depth = 0
): Promise<string> => {
  const known = context.nameOf(arn);
  if (known !== undefined) return known;

  const { specification, fetch } = context.options;
  const parsed = parseArn(arn);
  const { type, properties } = requireResourceType(specification, parsed);
  const name = resourceDisplayName(parsed);
  const resource = context.register(arn, name, type);

  if (depth > 0) print2(`Extracting ${arn}`);
  const fetched = await fetch(parsed);
  context.raw[name] = fetched;

  for (const property of properties) {
    const value = findPropertyValue(fetched, property);
    if (value === undefined) continue;
    resource.Properties[property] =
      typeof value === "string" && value.includes(NESTED_ARN_MARKER)
        ? await expandNestedArn(value, context, depth + 1)
        : value;
  }

  return name;
};
