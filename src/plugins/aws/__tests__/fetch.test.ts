/** Copyright © 2024-present P0 Security

This file is part of @p0security/cli

@p0security/cli is free software: you can redistribute it and/or modify it under the terms of the GNU General Public License as published by the Free Software Foundation, version 3 of the License.

@p0security/cli is distributed in the hope that it will be useful, but WITHOUT ANY WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the GNU General Public License for more details.

You should have received a copy of the GNU General Public License along with @p0security/cli. If not, see <https://www.gnu.org/licenses/>.
**/
import {
  FetchTimeoutError,
  InvalidFetchParametersError,
  NoFetchOperationError,
} from "../../../types/errors";
import {
  fetchParameterName,
  fetchResource,
  selectFetchOperation,
  toFetchedResource,
} from "../fetch";
import { FETCH_OPERATIONS } from "../operations";
import type { AwsSession, FetchOperation, FetchOperations } from "../types";
import { parseArn } from "../utils";
import { fromIni } from "@aws-sdk/credential-providers";
import { beforeEach, describe, expect, it, vi, Mock } from "vitest";

vi.mock("../../../drivers/stdio");
vi.mock("@aws-sdk/credential-providers", () => ({
  fromIni: vi.fn(() => vi.fn()),
}));

const SESSION: AwsSession = { profile: "test-profile", defaultRegion: "us-east-1" };

const mockFromIni = fromIni as Mock;

const operation = (
  name: string,
  parameter: string,
  invoke: FetchOperation["invoke"] = vi.fn().mockResolvedValue({})
): FetchOperation => ({ operation: name, parameter, invoke });

describe("fetchParameterName() function", () => {
  it.each([
    ["function", "FunctionName"],
    ["role", "RoleName"],
    ["stream", "StreamName"],
  ])("derives the argument name for %s", (resourceType, expected) => {
    expect(fetchParameterName(resourceType)).toBe(expected);
  });
});

describe("selectFetchOperation() function", () => {
  const operations: FetchOperations = {
    "svc:both": {
      get: operation("GetBoth", "BothName"),
      describe: operation("DescribeBoths", "BothName"),
    },
    "svc:widget": { describe: operation("DescribeWidgets", "WidgetName") },
  };

  it("prefers a get operation", () => {
    const selected = selectFetchOperation(
      parseArn("arn:aws:svc:us-east-1:123456789012:both/b1"),
      operations
    );
    expect(selected).toMatchObject({ operation: "GetBoth", strategy: "get" });
  });

  it("falls back to a describe operation", () => {
    const selected = selectFetchOperation(
      parseArn("arn:aws:svc:us-east-1:123456789012:Widget/w1"),
      operations
    );
    expect(selected).toMatchObject({
      operation: "DescribeWidgets",
      strategy: "describe",
      resourceType: "Widget",
    });
  });

  it("throws when no operation exists", () => {
    expect(() =>
      selectFetchOperation(
        parseArn("arn:aws:svc:us-east-1:123456789012:gadget/g1"),
        operations
      )
    ).toThrow(NoFetchOperationError);
  });

  it("throws for ARNs without a resource type", () => {
    expect(() =>
      selectFetchOperation(parseArn("arn:aws:s3:::my-bucket"))
    ).toThrow("No read operation is available to export s3:<none> resources");
  });

  it("knows how to read Lambda functions and IAM roles", () => {
    expect(FETCH_OPERATIONS["lambda:function"]?.get?.parameter).toBe(
      "FunctionName"
    );
    expect(FETCH_OPERATIONS["iam:role"]?.get?.parameter).toBe("RoleName");
  });
});

describe("toFetchedResource() function", () => {
  it("removes response metadata", () => {
    expect(
      toFetchedResource(
        { $metadata: { httpStatusCode: 200 }, Role: { RoleName: "myRole" } },
        "get"
      )
    ).toEqual({ Role: { RoleName: "myRole" } });
  });

  it("unwraps single-item describe responses", () => {
    expect(
      toFetchedResource(
        { $metadata: {}, Stacks: [{ StackName: "web" }] },
        "describe"
      )
    ).toEqual({ StackName: "web" });
  });

  it("leaves multi-item describe responses as they are", () => {
    const response = { Stacks: [{ StackName: "a" }, { StackName: "b" }] };
    expect(toFetchedResource(response, "describe")).toEqual(response);
  });

  it("does not unwrap get responses", () => {
    const response = { Items: [{ Name: "a" }] };
    expect(toFetchedResource(response, "get")).toEqual(response);
  });
});

describe("fetchResource() function", () => {
  let invoke: Mock;
  let operations: FetchOperations;

  beforeEach(() => {
    vi.clearAllMocks();
    invoke = vi.fn().mockResolvedValue({
      $metadata: { requestId: "req-1" },
      Configuration: { FunctionName: "myFunction" },
    });
    operations = {
      "lambda:function": { get: operation("GetFunction", "FunctionName", invoke) },
    };
  });

  it("calls the read operation in the ARN's region", async () => {
    const fetched = await fetchResource(
      parseArn("arn:aws:lambda:eu-west-1:123456789012:function:myFunction"),
      SESSION,
      { operations }
    );

    expect(fetched).toEqual({ Configuration: { FunctionName: "myFunction" } });
    expect(invoke).toHaveBeenCalledTimes(1);
    expect(invoke.mock.calls[0]?.[0]).toMatchObject({ region: "eu-west-1" });
    expect(invoke.mock.calls[0]?.[1]).toBe("myFunction");
    expect(mockFromIni).toHaveBeenCalledWith({ profile: "test-profile" });
  });

  it("identifies qualified resources by their qualifier", async () => {
    await fetchResource(
      parseArn("arn:aws:lambda:eu-west-1:123456789012:function:myFunction:PROD"),
      SESSION,
      { operations }
    );
    expect(invoke.mock.calls[0]?.[1]).toBe("PROD");
  });

  it("uses the default region for regionless ARNs", async () => {
    operations = { "iam:role": { get: operation("GetRole", "RoleName", invoke) } };
    await fetchResource(
      parseArn("arn:aws:iam::123456789012:role/myRole"),
      SESSION,
      { operations }
    );
    expect(invoke.mock.calls[0]?.[0]).toMatchObject({ region: "us-east-1" });
    expect(invoke.mock.calls[0]?.[1]).toBe("myRole");
  });

  it("rejects operations that take a differently named argument", async () => {
    operations = {
      "events:rule": { describe: operation("DescribeRule", "Name", invoke) },
    };
    await expect(
      fetchResource(
        parseArn("arn:aws:events:us-east-1:123456789012:rule/nightly"),
        SESSION,
        { operations }
      )
    ).rejects.toThrow(
      "Unable to retrieve this resource for export with DescribeRule: expected Name, but the ARN provides RuleName"
    );
    expect(invoke).not.toHaveBeenCalled();
  });

  it("reports invalid parameters rejected by AWS", async () => {
    invoke.mockRejectedValue(
      Object.assign(new Error("1 validation error detected"), {
        name: "ValidationException",
      })
    );
    await expect(
      fetchResource(
        parseArn("arn:aws:lambda:us-east-1:123456789012:function:myFunction"),
        SESSION,
        { operations }
      )
    ).rejects.toThrow(InvalidFetchParametersError);
  });

  it("passes other errors through", async () => {
    const error = Object.assign(new Error("Function not found"), {
      name: "ResourceNotFoundException",
    });
    invoke.mockRejectedValue(error);
    await expect(
      fetchResource(
        parseArn("arn:aws:lambda:us-east-1:123456789012:function:myFunction"),
        SESSION,
        { operations }
      )
    ).rejects.toBe(error);
  });

  it("times out slow calls", async () => {
    invoke.mockReturnValue(new Promise(() => {}));
    await expect(
      fetchResource(
        parseArn("arn:aws:lambda:us-east-1:123456789012:function:myFunction"),
        SESSION,
        { operations, timeoutMillis: 10 }
      )
    ).rejects.toThrow(FetchTimeoutError);
  });
});
