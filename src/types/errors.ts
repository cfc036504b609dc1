/** Copyright © 2024-present P0 Security

This file is part of @p0security/cli

@p0security/cli is free software: you can redistribute it and/or modify it under the terms of the GNU General Public License as published by the Free Software Foundation, version 3 of the License.

@p0security/cli is distributed in the hope that it will be useful, but WITHOUT ANY WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the GNU General Public License for more details.

You should have received a copy of the GNU General Public License along with @p0security/cli. If not, see <https://www.gnu.org/licenses/>.
**/

export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliError";
  }
}

/** The ARN's delimiter counts match none of the known ARN shapes */
export class UnrecognizedArnShapeError extends CliError {
  constructor(
    readonly arn: string,
    readonly shapeIndex: number
  ) {
    super(`Unrecognized ARN shape (shape index ${shapeIndex}): ${arn}`);
    this.name = "UnrecognizedArnShapeError";
  }
}

export class UnknownResourceTypeError extends CliError {
  constructor(
    readonly service: string | undefined,
    readonly resourceType: string | undefined
  ) {
    super(
      resourceType === undefined
        ? `ARN for service "${service ?? ""}" has no resource type; it can not be exported`
        : `Unknown CloudFormation resource type AWS::${service ?? ""}::${resourceType}`
    );
    this.name = "UnknownResourceTypeError";
  }
}

export class NoFetchOperationError extends CliError {
  constructor(
    readonly service: string | undefined,
    readonly resourceType: string | undefined
  ) {
    super(
      `No read operation is available to export ${service ?? ""}:${resourceType ?? "<none>"} resources`
    );
    this.name = "NoFetchOperationError";
  }
}

export class InvalidFetchParametersError extends CliError {
  constructor(
    readonly operation: string,
    detail: string
  ) {
    super(`Unable to retrieve this resource for export with ${operation}: ${detail}`);
    this.name = "InvalidFetchParametersError";
  }
}

export class FetchTimeoutError extends CliError {
  constructor(
    readonly operation: string,
    readonly timeoutMillis: number
  ) {
    super(`${operation} did not respond within ${timeoutMillis} ms`);
    this.name = "FetchTimeoutError";
  }
}

export class ResourceNameCollisionError extends CliError {
  constructor(
    readonly resourceName: string,
    readonly existingArn: string,
    readonly arn: string
  ) {
    super(
      `Resource name "${resourceName}" is derived from both ${existingArn} and ${arn}`
    );
    this.name = "ResourceNameCollisionError";
  }
}

export class InvalidResourceSpecificationError extends CliError {
  constructor(
    readonly path: string,
    detail?: string
  ) {
    super(
      `${path} is not a CloudFormation resource specification document` +
        (detail ? ` (${detail})` : "")
    );
    this.name = "InvalidResourceSpecificationError";
  }
}

/** A numeric command-line limit that is not a usable number */
export class InvalidOptionError extends CliError {
  constructor(
    readonly option: string,
    readonly value: number,
    expected: string
  ) {
    super(`Invalid value for --${option}: ${value} (expected ${expected})`);
    this.name = "InvalidOptionError";
  }
}
