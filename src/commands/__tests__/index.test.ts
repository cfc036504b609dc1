/** Copyright © 2024-present P0 Security

This file is part of @p0security/cli

@p0security/cli is free software: you can redistribute it and/or modify it under the terms of the GNU General Public License as published by the Free Software Foundation, version 3 of the License.

@p0security/cli is distributed in the hope that it will be useful, but WITHOUT ANY WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the GNU General Public License for more details.

You should have received a copy of the GNU General Public License along with @p0security/cli. If not, see <https://www.gnu.org/licenses/>.
**/
import { print1, print2 } from "../../drivers/stdio";
import { observedExit } from "../../opentelemetry/otel-helpers";
import { UnrecognizedArnShapeError } from "../../types/errors";
import { getCli } from "../index";
import { noop } from "lodash";
import { beforeEach, describe, expect, it, vi, Mock } from "vitest";

vi.mock("../../drivers/stdio");
vi.mock("../../opentelemetry/otel-helpers");

const mockPrint1 = print1 as Mock;
const mockPrint2 = print2 as Mock;
const mockObservedExit = vi.mocked(observedExit);

// observedExit is mocked and does not end the run, so a failed command
// also rejects from parse()
const run = async (command: string) => {
  const cli = await getCli();
  await Promise.resolve(cli.exitProcess(false).parse(command)).catch(noop);
};

describe("getCli", () => {
  beforeEach(() => vi.clearAllMocks());

  it("should run subcommands", async () => {
    await run("parse arn:aws:s3:::my-bucket");

    expect(mockPrint1).toHaveBeenCalledTimes(1);
    expect(mockObservedExit).not.toHaveBeenCalled();
  });

  it("should print command errors and exit with an error code", async () => {
    const arn = "arn:aws:ec2:us-east-1:123456789012";
    await run(`parse ${arn}`);

    expect(mockPrint2).toHaveBeenCalledWith(
      `Unrecognized ARN shape (shape index -1): ${arn}`
    );
    expect(mockObservedExit).toHaveBeenCalledWith(
      1,
      expect.any(UnrecognizedArnShapeError)
    );
  });

  it("should print usage when no command is given", async () => {
    await run("");

    expect(mockPrint2).toHaveBeenCalledWith(
      "\nNot enough non-option arguments: got 0, need at least 1"
    );
    expect(mockObservedExit).toHaveBeenCalledWith(
      1,
      "Not enough non-option arguments: got 0, need at least 1"
    );
  });
});
