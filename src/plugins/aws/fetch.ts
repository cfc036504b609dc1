/** Copyright © 2024-present P0 Security

This file is part of @p0security/cli

@p0security/cli is free software: you can redistribute it and/or modify it under the terms of the GNU General Public License as published by the Free Software Foundation, version 3 of the License.

@p0security/cli is distributed in the hope that it will be useful, but WITHOUT ANY WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the GNU General Public License for more details.

You should have received a copy of the GNU General Public License along with @p0security/cli. If not, see <https://www.gnu.org/licenses/>.
**/
import { defaultConfig } from "../../drivers/env";
import { print2 } from "../../drivers/stdio";
import { traceSpan } from "../../opentelemetry/otel-helpers";
import {
  FetchTimeoutError,
  InvalidFetchParametersError,
  NoFetchOperationError,
} from "../../types/errors";
import { timeout } from "../../util";
import { FETCH_OPERATIONS } from "./operations";
import type {
  AwsClientConfig,
  AwsSession,
  FetchedResource,
  FetchOperation,
  FetchOperations,
  FetchStrategy,
  ParsedArn,
} from "./types";
import { isRecord } from "./utils";
import { fromIni } from "@aws-sdk/credential-providers";
import { camelCase, memoize, upperFirst } from "lodash";

/** Error names AWS services use when they reject a request's arguments */
const INVALID_PARAMETER_ERRORS = [
  "InvalidParameterException",
  "InvalidParameterValueException",
  "ValidationError",
  "ValidationException",
];

export type FetchOptions = {
  operations?: FetchOperations;
  timeoutMillis?: number;
  debug?: boolean;
};

type SelectedOperation = FetchOperation & {
  strategy: FetchStrategy;
  resourceType: string;
};

const credentialsFor = memoize((profile: string) => fromIni({ profile }));

/** The name of the argument that identifies a resource, e.g. `FunctionName` */
export const fetchParameterName = (resourceType: string) =>
  `${upperFirst(camelCase(resourceType))}Name`;

/** Chooses the read operation for an ARN, preferring `get` over `describe` */
export const selectFetchOperation = (
  parsed: ParsedArn,
  operations: FetchOperations = FETCH_OPERATIONS
): SelectedOperation => {
  const { service, resourcetype } = parsed;
  const entry =
    service !== undefined && resourcetype !== undefined
      ? operations[`${service}:${resourcetype}`.toLowerCase()]
      : undefined;
  if (entry?.get && resourcetype !== undefined)
    return { ...entry.get, strategy: "get", resourceType: resourcetype };
  if (entry?.describe && resourcetype !== undefined)
    return { ...entry.describe, strategy: "describe", resourceType: resourcetype };
  throw new NoFetchOperationError(service, resourcetype);
};

/** Removes response metadata, and unwraps single-item describe responses
 *
 * Describe operations answer with a list (`{ Stacks: [stack] }`); when that
 * list holds exactly one resource, the resource itself is returned.
 */
export const toFetchedResource = (
  response: object,
  strategy: FetchStrategy
): FetchedResource => {
  const entries: [string, unknown][] = Object.entries(response).filter(
    ([key]) => key !== "$metadata"
  );
  const body: FetchedResource = Object.fromEntries(entries);
  if (strategy !== "describe" || entries.length !== 1) return body;

  const value = entries[0]?.[1];
  if (Array.isArray(value) && value.length === 1) {
    const item: unknown = value[0];
    if (isRecord(item)) return item;
  }
  return body;
};

const asFetchError = (error: unknown, operation: string) =>
  error instanceof Error && INVALID_PARAMETER_ERRORS.includes(error.name)
    ? new InvalidFetchParametersError(operation, error.message)
    : error;

/** Retrieves a resource's current properties from AWS
 *
 * Performs exactly one read call; nothing is retried.
 */
export const fetchResource = async (
  parsed: ParsedArn,
  session: AwsSession,
  options: FetchOptions = {}
): Promise<FetchedResource> => {
  const {
    operations = FETCH_OPERATIONS,
    timeoutMillis = defaultConfig.timeoutMillis,
    debug,
  } = options;

  const selected = selectFetchOperation(parsed, operations);
  const { operation } = selected;

  const parameter = fetchParameterName(selected.resourceType);
  if (parameter !== selected.parameter) {
    throw new InvalidFetchParametersError(
      operation,
      `expected ${selected.parameter}, but the ARN provides ${parameter}`
    );
  }
  const value = parsed.qualifier ?? parsed.resource ?? "";

  const config: AwsClientConfig = {
    region: parsed.region || session.defaultRegion,
    credentials: credentialsFor(session.profile),
  };

  if (debug) {
    print2(`Calling ${operation} with ${parameter}=${value} in ${config.region}`);
  }

  return await traceSpan(
    "fetchResource",
    async () => {
      try {
        const response = await timeout(
          selected.invoke(config, value),
          timeoutMillis,
          () => new FetchTimeoutError(operation, timeoutMillis)
        );
        return toFetchedResource(response, selected.strategy);
      } catch (error) {
        throw asFetchError(error, operation);
      }
    },
    { "aws.operation": operation, "aws.region": config.region }
  );
};
