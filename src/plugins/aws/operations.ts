/** Copyright © 2024-present P0 Security

This file is part of @p0security/cli

@p0security/cli is free software: you can redistribute it and/or modify it under the terms of the GNU General Public License as published by the Free Software Foundation, version 3 of the License.

@p0security/cli is distributed in the hope that it will be useful, but WITHOUT ANY WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the GNU General Public License for more details.

You should have received a copy of the GNU General Public License along with @p0security/cli. If not, see <https://www.gnu.org/licenses/>.
**/
import type { FetchOperations } from "./types";
import {
  CloudFormationClient,
  DescribeStacksCommand,
} from "@aws-sdk/client-cloudformation";
import { DescribeTableCommand, DynamoDBClient } from "@aws-sdk/client-dynamodb";
import {
  GetGroupCommand,
  GetRoleCommand,
  GetUserCommand,
  IAMClient,
} from "@aws-sdk/client-iam";
import { DescribeStreamCommand, KinesisClient } from "@aws-sdk/client-kinesis";
import { GetFunctionCommand, LambdaClient } from "@aws-sdk/client-lambda";

/** Read operations used to export each supported resource type
 *
 * A `get` operation is preferred over a `describe` operation when a type
 * has both.
 */
export const FETCH_OPERATIONS: FetchOperations = {
  "cloudformation:stack": {
    describe: {
      operation: "DescribeStacks",
      parameter: "StackName",
      invoke: (config, StackName) =>
        new CloudFormationClient(config).send(
          new DescribeStacksCommand({ StackName })
        ),
    },
  },
  "dynamodb:table": {
    describe: {
      operation: "DescribeTable",
      parameter: "TableName",
      invoke: (config, TableName) =>
        new DynamoDBClient(config).send(new DescribeTableCommand({ TableName })),
    },
  },
  "iam:group": {
    get: {
      operation: "GetGroup",
      parameter: "GroupName",
      invoke: (config, GroupName) =>
        new IAMClient(config).send(new GetGroupCommand({ GroupName })),
    },
  },
  "iam:role": {
    get: {
      operation: "GetRole",
      parameter: "RoleName",
      invoke: (config, RoleName) =>
        new IAMClient(config).send(new GetRoleCommand({ RoleName })),
    },
  },
  "iam:user": {
    get: {
      operation: "GetUser",
      parameter: "UserName",
      invoke: (config, UserName) =>
        new IAMClient(config).send(new GetUserCommand({ UserName })),
    },
  },
  "kinesis:stream": {
    describe: {
      operation: "DescribeStream",
      parameter: "StreamName",
      invoke: (config, StreamName) =>
        new KinesisClient(config).send(new DescribeStreamCommand({ StreamName })),
    },
  },
  "lambda:function": {
    get: {
      operation: "GetFunction",
      parameter: "FunctionName",
      invoke: (config, FunctionName) =>
        new LambdaClient(config).send(new GetFunctionCommand({ FunctionName })),
    },
  },
};
