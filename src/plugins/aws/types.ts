/** Copyright © 2024-present P0 Security

This file is part of @p0security/cli

@p0security/cli is free software: you can redistribute it and/or modify it under the terms of the GNU General Public License as published by the Free Software Foundation, version 3 of the License.

@p0security/cli is distributed in the hope that it will be useful, but WITHOUT ANY WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the GNU General Public License for more details.

You should have received a copy of the GNU General Public License along with @p0security/cli. If not, see <https://www.gnu.org/licenses/>.
**/
import type { fromIni } from "@aws-sdk/credential-providers";

export type ArnField =
  | "partition"
  | "service"
  | "region"
  | "account-id"
  | "resourcetype"
  | "resource"
  | "qualifier";

/** An ARN split into its fields
 *
 * Only the fields named by the ARN's shape are present; e.g. a bare
 * `arn:aws:s3:::bucket` ARN has no `resourcetype`.
 */
export type ParsedArn = Partial<Record<ArnField, string>>;

export type ResourceSpecification = {
  ResourceSpecificationVersion?: string;
  ResourceTypes: Record<string, { Properties?: Record<string, unknown> }>;
};

export type ResolvedResourceType = {
  /** The canonical, correctly-cased type name, e.g. `AWS::Lambda::Function` */
  type: string;
  /** Property names in the specification's declared order */
  properties: string[];
};

/** A provider read-API response, without transport metadata */
export type FetchedResource = Record<string, unknown>;

export type Reference = { Ref: string };

export type TemplateResource = {
  Type: string;
  Properties: Record<string, unknown>;
};

export type TemplateDocument<R = TemplateResource> = {
  AWSTemplateFormatVersion: "2010-09-09";
  Description: string;
  Resources: Record<string, R>;
};

export type AwsClientConfig = {
  region: string;
  credentials: ReturnType<typeof fromIni>;
};

export type FetchStrategy = "get" | "describe";

export type FetchOperation = {
  /** The API operation name, used in messages */
  operation: string;
  /** The single input parameter the operation identifies the resource by */
  parameter: string;
  invoke: (config: AwsClientConfig, value: string) => Promise<object>;
};

/** Read operations, keyed by lower-cased `<service>:<resourcetype>` */
export type FetchOperations = Record<
  string,
  Partial<Record<FetchStrategy, FetchOperation>>
>;

export type AwsSession = {
  profile: string;
  defaultRegion: string;
};
