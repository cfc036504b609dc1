/** Copyright © 2024-present P0 Security

This file is part of @p0security/cli

@p0security/cli is free software: you can redistribute it and/or modify it under the terms of the GNU General Public License as published by the Free Software Foundation, version 3 of the License.

@p0security/cli is distributed in the hope that it will be useful, but WITHOUT ANY WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the GNU General Public License for more details.

You should have received a copy of the GNU General Public License along with @p0security/cli. If not, see <https://www.gnu.org/licenses/>.
**/
import { UnrecognizedArnShapeError } from "../../types/errors";
import type { ArnField, ParsedArn } from "./types";
import { isPlainObject } from "lodash";

const ARN_PREFIX = "arn:partition:service:region:account-id:";

/** Suffix templates, indexed by ARN shape */
const ARN_SHAPES = [
  "resource",
  "resourcetype:resource",
  "resourcetype:resource:qualifier",
  "resourcetype/resource",
  "resourcetype/resource:qualifier",
  "",
  "resourcetype/resource/qualifier",
];

const count = (text: string, delimiter: string) =>
  text.split(delimiter).length - 1;

const ARN_FIELDS: readonly ArnField[] = [
  "partition",
  "service",
  "region",
  "account-id",
  "resourcetype",
  "resource",
  "qualifier",
];

const asArnField = (key: string) => ARN_FIELDS.find((field) => field === key);

/** Computes the index of an ARN's shape in {@link ARN_SHAPES}
 *
 * Each colon beyond those of the common prefix adds one, and each slash
 * adds three.
 */
export const arnShapeIndex = (arn: string) =>
  count(arn, ":") - count(ARN_PREFIX, ":") + 3 * count(arn, "/");

/**
 * Parses an Amazon Resource Name (ARN) into its fields.
 *
 * The ARN's shape is chosen purely by counting its delimiters; fields are then
 * assigned positionally. Slashes and colons are treated alike once the shape
 * is known, so `role/service-role/my-role` yields a resource type, resource,
 * and qualifier.
 *
 * Note that some ARNs omit the region, the account ID, or both; these fields
 * are then present as empty strings.
 *
 * @throws UnrecognizedArnShapeError if the delimiters match no known shape
 */
export const parseArn = (arn: string): ParsedArn => {
  // Reference: https://docs.aws.amazon.com/IAM/latest/UserGuide/reference-arns.html
  const shapeIndex = arnShapeIndex(arn);
  const suffix = ARN_SHAPES[shapeIndex];

  if (suffix === undefined) {
    throw new UnrecognizedArnShapeError(arn, shapeIndex);
  }

  const keys = `${ARN_PREFIX}${suffix}`.replace(/\//g, ":").split(":");
  const values = arn.replace(/\//g, ":").split(":");

  const parsed: ParsedArn = {};
  keys.forEach((key, ix) => {
    const field = asArnField(key);
    const value = values[ix];
    if (field && value !== undefined) parsed[field] = value;
  });
  return parsed;
};

/** Derives a template resource name from a parsed ARN
 *
 * Uses the qualifier when present, otherwise the resource; hyphens are
 * removed.
 */
export const resourceDisplayName = (parsed: ParsedArn) =>
  (parsed.qualifier ?? parsed.resource ?? "").replace(/-/g, "");

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  isPlainObject(value);
